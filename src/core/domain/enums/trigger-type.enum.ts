/**
 * What caused a lifecycle transition
 */
export enum TriggerType {
  /**
   * Inbound message delivered through the webhook
   */
  MESSAGE = 'message',

  /**
   * Close requested through the admin surface
   */
  ADMIN_CLOSE = 'admin_close',
}
