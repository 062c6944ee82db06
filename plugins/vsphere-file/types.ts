import type { AppError } from '@/lib/errors/error';

export type DesiredState = 'absent' | 'directory' | 'file' | 'touch';

export type ReportedState = DesiredState;

export type VsphereFileParams = {
  host: string;
  port: number;
  username: string;
  password: string;
  datacenter: string;
  datastore: string;
  path: string;
  state: DesiredState;
  /** Seconds, applied to every HTTP call. */
  timeout: number;
  validate_certs: boolean;
};

export type ResponseHeaders = Record<string, string>;

export type ProbeResult =
  | { kind: 'found'; status: 200; size: number }
  | { kind: 'not_found'; status: 404 }
  | { kind: 'error'; status: number; reason: string; headers: ResponseHeaders };

export type ReconcileResult = {
  path: string;
  size: number | null;
  state: ReportedState;
  status: number | null;
  url: string;
  reason: string | null;
};

export type ReconcileSuccess = ReconcileResult & { changed: boolean };

export type FailureFields = {
  msg: string;
  errno: string | null;
  reason: string | null;
  headers?: ResponseHeaders;
  error: AppError;
};

export type ReconcileFailure = ReconcileResult & FailureFields;

export type ReconcileOutcome = { ok: true; result: ReconcileSuccess } | { ok: false; failure: ReconcileFailure };

export type VsphereFileResponseV1 =
  | ({ schema_version: 'vsphere-file-response-v1'; failed: false } & ReconcileSuccess)
  | ({ schema_version: 'vsphere-file-response-v1'; failed: true; changed: false } & Partial<ReconcileResult> &
      FailureFields);
