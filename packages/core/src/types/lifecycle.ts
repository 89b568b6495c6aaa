/**
 * Steps a create operation walks through. `rolled-back` ends the run with an
 * error; the ssl-* states only appear when SSL was requested.
 */
export type LifecycleState =
  | "drafted"
  | "written"
  | "test-pending"
  | "active"
  | "rolled-back"
  | "ssl-pending"
  | "ssl-active"
  | "ssl-failed";

export type SslOutcome = "skipped" | "active" | "failed";

export interface SiteLifecycleResult {
  domain: string;
  path: string;
  states: LifecycleState[];
  ssl: SslOutcome;
  sslError?: string;
}

export type StateChangeListener = (
  state: LifecycleState,
  domain: string
) => void;
