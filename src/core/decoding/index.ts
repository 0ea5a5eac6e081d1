export * from './payload-accessors';
export * from './whatsapp-payload.decoder';
