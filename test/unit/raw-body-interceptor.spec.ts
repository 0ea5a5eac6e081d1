import { ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';
import {
  ConfigurationService,
  ConversationLifecycleEngine,
  ConversationService,
  MockStorageAdapter,
  RawBodyInterceptor,
  TEST_APP_SECRET,
  TEST_VERIFY_TOKEN,
  WebhookController,
  WebhookProcessor,
  WhatsAppWebhookFactory,
  mergeConfig,
} from '../../src';

interface FakeRequest {
  body?: unknown;
  rawBody?: Buffer;
}

describe('RawBodyInterceptor', () => {
  const interceptor = new RawBodyInterceptor();

  const intercept = (request: FakeRequest): Promise<unknown> =>
    lastValueFrom(
      interceptor.intercept(new ExecutionContextHost([request]), {
        handle: () => of('handled'),
      }),
    );

  const bodyOf = (request: FakeRequest): Buffer => {
    if (!Buffer.isBuffer(request.body)) {
      throw new Error('Request body is not a buffer');
    }
    return request.body;
  };

  it('should hand the captured raw bytes to the handler', async () => {
    const raw = Buffer.from('{"object":"whatsapp_business_account"}');
    const request: FakeRequest = { body: { object: 'parsed' }, rawBody: raw };

    expect(await intercept(request)).toBe('handled');
    expect(request.body).toBe(raw);
  });

  it('should keep a body that is already a buffer', async () => {
    const raw = Buffer.from('{"entry":[]}');
    const request: FakeRequest = { body: raw };

    await intercept(request);

    expect(request.body).toBe(raw);
    expect(request.rawBody).toBe(raw);
  });

  it('should turn a text body into bytes', async () => {
    const request: FakeRequest = { body: '{"entry":[]}' };

    await intercept(request);

    expect(bodyOf(request).toString()).toBe('{"entry":[]}');
    expect(request.rawBody).toBe(request.body);
  });

  describe('with a body parsed without its bytes', () => {
    it('should substitute an empty buffer', async () => {
      const request: FakeRequest = { body: { object: 'whatsapp_business_account' } };

      await intercept(request);

      expect(bodyOf(request)).toHaveLength(0);
      expect(request.rawBody).toBe(request.body);
    });

    it('should leave the delivery to be refused with 403', async () => {
      const store = new MockStorageAdapter();
      await store.initialize();
      const engine = new ConversationLifecycleEngine(store);
      const config = mergeConfig({
        storage: { type: 'memory' },
        whatsapp: { appSecret: TEST_APP_SECRET, verifyToken: TEST_VERIFY_TOKEN },
      });
      const controller = new WebhookController(
        new WebhookProcessor({ store, engine, appSecret: TEST_APP_SECRET }),
        new ConversationService(store, engine),
        new ConfigurationService(config),
      );
      const webhook = WhatsAppWebhookFactory.message({ from: '5511999', timestamp: 100 });
      const request: FakeRequest = { body: JSON.parse(webhook.body.toString()) };

      await intercept(request);

      await expect(
        controller.handleWebhook(bodyOf(request), webhook.headers),
      ).rejects.toThrow(ForbiddenException);
      expect(await store.getConversation('5511999')).toBeNull();
    });
  });
});
