import {
  getLogger,
  isLogLevel,
  MemoryLogger,
  parseLogLevel,
  setLogger,
  withMinLevel,
} from '../src/logging/logger';

describe('logger', () => {
  afterEach(() => setLogger(null));

  it('should be silent until a logger is installed', () => {
    const log = getLogger('test');
    expect(() => log.warn('nobody listens')).not.toThrow();
  });

  it('should route module loggers to the logger installed later', () => {
    const log = getLogger('schema');
    const memory = new MemoryLogger();
    setLogger(memory);
    log.info('columns frozen', 27);
    expect(memory.entries).toEqual([{ level: 'info', namespace: 'schema', message: 'columns frozen', args: [27] }]);
  });

  it('should join namespaces of child loggers', () => {
    const memory = new MemoryLogger();
    setLogger(memory);
    getLogger('convert').child('file').debug('opened');
    expect(memory.at('debug').map(e => e.namespace)).toEqual(['convert:file']);
  });

  it('should drop entries below the minimum level', () => {
    const memory = new MemoryLogger();
    const log = withMinLevel(memory, 'warn');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.child('batch').error('also shown');
    expect(memory.entries.map(e => [e.level, e.message, e.namespace])).toEqual([
      ['warn', 'shown', undefined],
      ['error', 'also shown', 'batch'],
    ]);
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(() => parseLogLevel('verbose')).toThrow(RangeError);
  });
});
