/**
 * Webhook processing outcomes - every delivery gets classified
 */
export enum ProcessingStatus {
  /**
   * Every decoded event was applied (zero events included)
   */
  PROCESSED = 'processed',

  /**
   * At least one event failed in storage; the rest were applied
   */
  PARTIALLY_FAILED = 'partially_failed',

  /**
   * Body is not a JSON object
   */
  MALFORMED_PAYLOAD = 'malformed_payload',

  /**
   * Signature header missing, malformed or not matching
   */
  SIGNATURE_FAILED = 'signature_failed',

  /**
   * App secret is not configured
   */
  CONFIGURATION_ERROR = 'configuration_error',

  /**
   * Time budget ran out; events already started were applied and are listed
   * with their outcomes, the rest were skipped
   */
  TIMEOUT = 'timeout',
}
