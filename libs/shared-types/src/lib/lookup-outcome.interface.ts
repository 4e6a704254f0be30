import type { ClanRecord } from './clan.interface';

/**
 * Why a lookup could not be answered.
 * - `upstream_rejected`: the API answered but its `status` was not "ok"
 * - `transport_failure`: connection error, timeout or non-2xx response
 * - `malformed_payload`: the JSON body did not have the expected shape
 *
 * Both `transport_failure` and `malformed_payload` surface to callers the same way;
 * the split is kept for logging.
 */
export type LookupFailureReason =
  | 'upstream_rejected'
  | 'transport_failure'
  | 'malformed_payload';

export type LookupOutcome =
  | { kind: 'found'; clan: ClanRecord }
  | { kind: 'not_found'; message: string }
  | { kind: 'request_failed'; reason: LookupFailureReason; message: string };
