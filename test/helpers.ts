export const EVENT_NS = 'http://schemas.microsoft.com/win/2004/08/events/event';

export interface EventParts {
  eventId?: number | string;
  recordId?: number;
  level?: string;
  channel?: string;
  /** [Name, value] pairs; a null name writes an unnamed <Data> */
  data?: Array<[string | null, string]>;
  /** Raw XML placed after EventData, e.g. a <UserData> block */
  tail?: string;
}

/** A compact, well-formed event record. */
export function eventXml(parts: EventParts = {}): string {
  const { eventId = 4624, recordId = 1, level = '4', channel = 'Security', data, tail = '' } = parts;
  const items = (data ?? [])
    .map(([name, value]) => (name === null ? `<Data>${value}</Data>` : `<Data Name="${name}">${value}</Data>`))
    .join('');
  const eventData = data ? `<EventData>${items}</EventData>` : '';
  return (
    `<Event xmlns="${EVENT_NS}"><System>` +
    `<Provider Name="Test-Provider" Guid="{00000000-0000-0000-0000-000000000001}"/>` +
    `<EventID>${eventId}</EventID><Level>${level}</Level><Channel>${channel}</Channel>` +
    `<Computer>host.test</Computer><EventRecordID>${recordId}</EventRecordID>` +
    `</System>${eventData}${tail}</Event>`
  );
}

export const TRUNCATED_EVENT = `<Event xmlns="${EVENT_NS}"><System><EventID>4625</EventID>`;
