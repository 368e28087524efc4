export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type ParamSet = Record<string, unknown>;

export type UpstreamFailureKind = 'timeout' | 'connection' | 'http_status' | 'invalid_response';

export interface UpstreamFailure {
  kind: UpstreamFailureKind;
  message: string;
  statusCode?: number;
}

interface ItemResultBase {
  index: number;
  params: ParamSet;
  finishedAt: Date;
}

export interface ItemSuccess extends ItemResultBase {
  outcome: 'success';
  ok: true;
  statusCode: number;
  data: unknown;
}

export interface ItemError extends ItemResultBase {
  outcome: 'error';
  ok: false;
  error: UpstreamFailure;
}

export interface ItemCancelled extends ItemResultBase {
  outcome: 'cancelled';
  ok: false;
}

export type BatchItemResult = ItemSuccess | ItemError | ItemCancelled;

export interface InlineResult {
  kind: 'inline';
  items: BatchItemResult[];
}

export interface FileResult {
  kind: 'file';
  reference: string;
  itemCount: number;
  byteSize: number;
}

export type JobResultRef = InlineResult | FileResult;

export interface JobProgress {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
}

export interface JobError {
  code: string;
  message: string;
}

export interface BatchJob {
  id: string; // ULID
  endpoint: string; // resolved absolute URL
  method: HttpMethod;
  sourceId: string | number | null;
  params: ParamSet[];
  metadata: unknown; // JSON, opaque
  status: JobStatus;
  progress: JobProgress;
  cancelRequested: boolean;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  result: JobResultRef | null;
  error: JobError | null;
}

export interface SubmitBatchData {
  endpoint?: string;
  method?: HttpMethod;
  sourceId?: string | number;
  params: ParamSet[];
  metadata?: unknown;
}

export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  progress: JobProgress;
  cancelRequested: boolean;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  error: JobError | null;
  result?: InlineResult | FileResult;
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'cancelled', 'failed'],
  running: ['completed', 'cancelled', 'failed'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}
