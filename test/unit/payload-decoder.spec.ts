import {
  MalformedPayloadError,
  WhatsAppPayloadDecoder,
  WhatsAppWebhookFactory,
  parseTimestamp,
} from '../../src';

describe('WhatsAppPayloadDecoder', () => {
  // 1700000123456 ms -> 1700000123 s
  const decoder = new WhatsAppPayloadDecoder(() => 1700000123456);

  describe('decode', () => {
    it('should extract sender, timestamp, type and contact name', () => {
      const payload = WhatsAppWebhookFactory.payload([
        WhatsAppWebhookFactory.value(
          [{ from: '5511999', timestamp: 100 }],
          'Maria',
        ),
      ]);

      expect(decoder.decode(payload)).toEqual([
        {
          senderId: '5511999',
          messageTimestamp: 100,
          contactName: 'Maria',
          messageType: 'text',
        },
      ]);
    });

    it('should keep payload order across entries and changes', () => {
      const payload = {
        object: 'whatsapp_business_account',
        entry: [
          {
            changes: [
              { value: WhatsAppWebhookFactory.value([{ from: '1', timestamp: 10 }]) },
              { value: WhatsAppWebhookFactory.value([{ from: '2', timestamp: 20 }]) },
            ],
          },
          {
            changes: [
              {
                value: WhatsAppWebhookFactory.value([
                  { from: '3', timestamp: 30 },
                  { from: '1', timestamp: 40 },
                ]),
              },
            ],
          },
        ],
      };

      expect(
        decoder.decode(payload).map((e) => [e.senderId, e.messageTimestamp]),
      ).toEqual([
        ['1', 10],
        ['2', 20],
        ['3', 30],
        ['1', 40],
      ]);
    });

    it('should fall back to the current time when the timestamp is missing', () => {
      const payload = WhatsAppWebhookFactory.payload([
        WhatsAppWebhookFactory.value([{ from: '5511999' }]),
      ]);

      expect(decoder.decode(payload)[0].messageTimestamp).toBe(1700000123);
    });

    it('should fall back to the current time for a non-numeric timestamp', () => {
      const payload = WhatsAppWebhookFactory.payload([
        {
          messages: [{ from: '5511999', type: 'text', timestamp: 'yesterday' }],
        },
      ]);

      expect(decoder.decode(payload)[0].messageTimestamp).toBe(1700000123);
    });

    it('should accept numeric timestamps', () => {
      const payload = WhatsAppWebhookFactory.payload([
        { messages: [{ from: '5511999', type: 'image', timestamp: 250 }] },
      ]);

      expect(decoder.decode(payload)).toEqual([
        {
          senderId: '5511999',
          messageTimestamp: 250,
          contactName: undefined,
          messageType: 'image',
        },
      ]);
    });

    it('should skip messages without a sender or a type', () => {
      const payload = WhatsAppWebhookFactory.payload([
        {
          messages: [
            { type: 'text', timestamp: '1' },
            { from: '', type: 'text', timestamp: '2' },
            { from: '5511999', timestamp: '3' },
            { from: '5511888', type: 'text', timestamp: '4' },
          ],
        },
      ]);

      expect(decoder.decode(payload).map((e) => e.senderId)).toEqual(['5511888']);
    });

    it('should leave the contact name undefined when the contact has no profile', () => {
      const payload = WhatsAppWebhookFactory.payload([
        {
          contacts: [{ wa_id: '5511999' }],
          messages: [{ from: '5511999', type: 'text', timestamp: '5' }],
        },
      ]);

      expect(decoder.decode(payload)[0].contactName).toBeUndefined();
    });

    it('should return no events for status-only deliveries', () => {
      const { payload } = WhatsAppWebhookFactory.statusUpdate();
      expect(decoder.decode(payload)).toEqual([]);
    });

    it('should return no events for another object type', () => {
      const payload = WhatsAppWebhookFactory.payload(
        [WhatsAppWebhookFactory.value([{ from: '5511999', timestamp: 1 }])],
        'page',
      );

      expect(decoder.decode(payload)).toEqual([]);
    });

    it.each([
      ['entry is not a list', { object: 'whatsapp_business_account', entry: {} }],
      [
        'changes is missing',
        { object: 'whatsapp_business_account', entry: [{ id: '1' }] },
      ],
      [
        'value is a string',
        { object: 'whatsapp_business_account', entry: [{ changes: [{ value: 'x' }] }] },
      ],
      [
        'messages is not a list',
        {
          object: 'whatsapp_business_account',
          entry: [{ changes: [{ value: { messages: 'x' } }] }],
        },
      ],
    ])('should return no events when %s', (_label, payload) => {
      expect(decoder.decode(payload)).toEqual([]);
    });
  });

  describe('decodeBody', () => {
    it('should parse and decode a JSON body', () => {
      const { body } = WhatsAppWebhookFactory.message({
        from: '5511999',
        timestamp: 100,
      });

      expect(decoder.decodeBody(body)).toHaveLength(1);
    });

    it('should reject a body that is not JSON', () => {
      expect(() => decoder.decodeBody(Buffer.from('not json'))).toThrow(
        MalformedPayloadError,
      );
    });

    it('should reject JSON that is not an object', () => {
      expect(() => decoder.decodeBody(Buffer.from('[1,2,3]'))).toThrow(
        'Webhook body is not a JSON object',
      );
      expect(() => decoder.decodeBody(Buffer.from('null'))).toThrow(
        MalformedPayloadError,
      );
    });
  });

  describe('parseTimestamp', () => {
    it('should parse digit strings and non-negative integers', () => {
      expect(parseTimestamp('1700000000')).toBe(1700000000);
      expect(parseTimestamp(42)).toBe(42);
    });

    it('should reject other values', () => {
      expect(parseTimestamp('-5')).toBeUndefined();
      expect(parseTimestamp('1.5')).toBeUndefined();
      expect(parseTimestamp(1.5)).toBeUndefined();
      expect(parseTimestamp(null)).toBeUndefined();
    });
  });
});
