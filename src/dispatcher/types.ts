/**
 * Result envelopes returned by `Dispatcher.handle()`.
 *
 * Every envelope carries `success` and the `session_id` the call ran
 * under; failures add `error`, successes the function-specific fields.
 */

import type { InformationRecord } from "../store/index.js";

export interface FailureEnvelope {
  success: false;
  error: string;
  session_id: string;
}

export interface ShareInformationResult {
  success: true;
  message: string;
  info_id: string;
  session_id: string;
  /** Information log length after the insert. */
  total_shared: number;
}

export interface EndCallResult {
  success: true;
  message: string;
  call_log_id: string;
  session_id: string;
  information_shared_count: number;
  total_calls: number;
}

export interface GetSharedInformationResult {
  success: true;
  information: InformationRecord[];
  count: number;
  /** Unfiltered log length. */
  total_available: number;
  session_id: string;
}

export type SuccessEnvelope =
  | ShareInformationResult
  | EndCallResult
  | GetSharedInformationResult;

export type Envelope = SuccessEnvelope | FailureEnvelope;
