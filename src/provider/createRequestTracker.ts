import { StaleResponseError } from '../errors';

export interface RequestTicket {
  readonly sequence: number;
  /** Epoch ms at issue time. */
  readonly issuedAt: number;
}

export interface RequestTracker {
  issue(): RequestTicket;
  isCurrent(ticket: RequestTicket): boolean;
  /** Returns the value when `ticket` is still the newest; throws `StaleResponseError` otherwise. */
  settle<T>(ticket: RequestTicket, value: T): T;
  latest(): RequestTicket | null;
}

/**
 * Orders fetches by issue. There is no network cancellation; a response is
 * applied only when its ticket is still the most recently issued one.
 */
export function createRequestTracker(now: () => number = Date.now): RequestTracker {
  let sequence = 0;
  let newest: RequestTicket | null = null;

  const isCurrent: RequestTracker['isCurrent'] = (ticket) => newest !== null && ticket.sequence === newest.sequence;

  return {
    issue() {
      newest = { sequence: ++sequence, issuedAt: now() };
      return newest;
    },
    isCurrent,
    settle(ticket, value) {
      if (!isCurrent(ticket)) throw new StaleResponseError(ticket.sequence, newest === null ? 0 : newest.sequence);
      return value;
    },
    latest: () => newest,
  };
}
