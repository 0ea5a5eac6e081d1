/**
 * Result of applying one trigger to one sender
 */
export enum TransitionOutcome {
  /** First message from an unseen sender */
  OPENED = 'opened',

  /** Message on an already open conversation */
  CONTINUED = 'continued',

  /** Message on a closed conversation */
  REOPENED = 'reopened',

  CLOSED = 'closed',

  ALREADY_CLOSED = 'already_closed',

  NOT_FOUND = 'not_found',
}
