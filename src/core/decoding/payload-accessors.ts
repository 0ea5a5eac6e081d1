/**
 * Total accessors over the WhatsApp Business webhook payload.
 *
 * Every function accepts any value and returns `undefined` (or an empty list)
 * when the level it reads is absent or has the wrong shape.
 *
 * {
 *   object: 'whatsapp_business_account',
 *   entry: [{ changes: [{ value: { contacts: [...], messages: [...] } }] }]
 * }
 */

export type JsonObject = { [key: string]: unknown };

export const WHATSAPP_BUSINESS_OBJECT = 'whatsapp_business_account';

export interface ContactInfo {
  waId?: string;
  name?: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asObject(value: unknown): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Objects of a list; non-object items are skipped
 */
export function objectList(value: unknown): JsonObject[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: JsonObject[] = [];
  for (const item of value) {
    const obj = asObject(item);
    if (obj) {
      items.push(obj);
    }
  }
  return items;
}

export function getObjectType(payload: unknown): string | undefined {
  return asString(asObject(payload)?.object);
}

export function getEntries(payload: unknown): JsonObject[] {
  return objectList(asObject(payload)?.entry);
}

export function getChanges(entry: JsonObject): JsonObject[] {
  return objectList(entry.changes);
}

export function getValue(change: JsonObject): JsonObject | undefined {
  return asObject(change.value);
}

/**
 * First contact of a value block
 */
export function getFirstContact(value: JsonObject): ContactInfo | undefined {
  const [contact] = objectList(value.contacts);
  if (!contact) {
    return undefined;
  }
  return {
    waId: asString(contact.wa_id),
    name: asString(asObject(contact.profile)?.name),
  };
}

export function getMessages(value: JsonObject): JsonObject[] {
  return objectList(value.messages);
}

export function getMessageSender(message: JsonObject): string | undefined {
  return asString(message.from);
}

export function getMessageType(message: JsonObject): string | undefined {
  return asString(message.type);
}

/**
 * Epoch seconds from a string or numeric timestamp; undefined when the value
 * is not a non-negative integer
 */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function getMessageTimestamp(message: JsonObject): number | undefined {
  return parseTimestamp(message.timestamp);
}
