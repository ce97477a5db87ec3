export type EndpointFamily = "livy" | "spark" | "yarn";

export type ConnectionProfile = {
  id: EndpointFamily;
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs?: number;
};

export type VerificationMethod = "spark" | "yarn";

export type VerificationBackend =
  | { kind: "none" }
  | { kind: "spark"; connection: ConnectionProfile }
  | { kind: "yarn"; connection: ConnectionProfile };

export type LogPolicy = "always" | "on_failure" | "never";

export type EmptySparkJobsPolicy = "succeed" | "fail";

export type LivyBatchConfig = {
  connections: {
    livy: ConnectionProfile;
    spark?: ConnectionProfile;
    yarn?: ConnectionProfile;
  };
  pollIntervalSec: number;
  timeoutMinutes: number;
  verifyIn?: VerificationMethod;
  logPolicy: LogPolicy;
  emptySparkJobs: EmptySparkJobsPolicy;
  requestedBy: string;
};

export type JobSubmission = {
  readonly file?: string;
  readonly proxyUser?: string;
  readonly className?: string;
  readonly args?: readonly string[];
  readonly jars?: readonly string[];
  readonly pyFiles?: readonly string[];
  readonly files?: readonly string[];
  readonly driverMemory?: string;
  readonly driverCores?: number;
  readonly executorMemory?: string;
  readonly executorCores?: number;
  readonly numExecutors?: number;
  readonly archives?: readonly string[];
  readonly queue?: string;
  readonly name?: string;
  readonly conf?: Readonly<Record<string, string>>;
};

export type SubmissionPayload = {
  [K in keyof JobSubmission]?: NonNullable<JobSubmission[K]>;
};

export type BatchJob = {
  batchId: string;
  state: string;
  appId?: string;
};

export type LogPage = {
  from: number;
  total: number;
  lines: string[];
};

export type HttpMethod = "GET" | "POST" | "DELETE";

export type RemoteRequest = {
  connection: ConnectionProfile;
  method: HttpMethod;
  path: string;
  body?: string;
  headers?: Record<string, string>;
};

export type RemoteResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
};

export type RemoteEndpointClient = (request: RemoteRequest) => Promise<RemoteResponse>;

export type BatchLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type Sleep = (ms: number) => Promise<void>;
