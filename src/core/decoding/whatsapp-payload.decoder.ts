import { Logger } from '@nestjs/common';
import { MalformedPayloadError } from '../domain/errors';
import { DecodedMessageEvent } from '../interfaces';
import {
  JsonObject,
  WHATSAPP_BUSINESS_OBJECT,
  asObject,
  getChanges,
  getEntries,
  getFirstContact,
  getMessageSender,
  getMessageTimestamp,
  getMessageType,
  getMessages,
  getObjectType,
  getValue,
} from './payload-accessors';

/**
 * Turns a webhook body into the ordered list of message events it carries.
 *
 * Only a body that is not a JSON object is an error; missing or ill-typed
 * branches contribute zero events.
 */
export class WhatsAppPayloadDecoder {
  private readonly logger = new Logger(WhatsAppPayloadDecoder.name);

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Parse the raw body into a JSON object
   */
  parse(rawBody: Buffer): JsonObject {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      throw new MalformedPayloadError(
        'Webhook body is not valid JSON',
        error instanceof Error ? error : undefined,
      );
    }

    const payload = asObject(parsed);
    if (!payload) {
      throw new MalformedPayloadError('Webhook body is not a JSON object');
    }
    return payload;
  }

  decodeBody(rawBody: Buffer): DecodedMessageEvent[] {
    return this.decode(this.parse(rawBody));
  }

  decode(payload: unknown): DecodedMessageEvent[] {
    const objectType = getObjectType(payload);
    if (objectType !== WHATSAPP_BUSINESS_OBJECT) {
      this.logger.warn(
        `Ignoring webhook for object '${objectType ?? 'unknown'}'`,
      );
      return [];
    }

    const invokedAt = Math.floor(this.now() / 1000);
    const events: DecodedMessageEvent[] = [];

    for (const entry of getEntries(payload)) {
      for (const change of getChanges(entry)) {
        const value = getValue(change);
        if (value) {
          events.push(...this.decodeValue(value, invokedAt));
        }
      }
    }

    return events;
  }

  private decodeValue(
    value: JsonObject,
    invokedAt: number,
  ): DecodedMessageEvent[] {
    const contact = getFirstContact(value);
    const events: DecodedMessageEvent[] = [];

    for (const message of getMessages(value)) {
      const senderId = getMessageSender(message);
      const messageType = getMessageType(message);
      if (!senderId || !messageType) {
        continue;
      }

      if (contact?.waId && contact.waId !== senderId) {
        this.logger.warn(
          `Contact wa_id ${contact.waId} does not match message sender ${senderId}`,
        );
      }

      events.push({
        senderId,
        messageTimestamp: getMessageTimestamp(message) ?? invokedAt,
        contactName: contact?.name,
        messageType,
      });
    }

    return events;
  }
}
