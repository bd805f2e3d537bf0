/**
 * Base class for errors the service reports by code rather than by stack.
 */
export class CrawlServiceError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The worker pool or its coordinator could not be constructed. */
export class InitializationError extends CrawlServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super("POOL_INITIALIZATION_FAILED", message, options);
  }
}

/** Something escaped the job runner inside a worker process. */
export class JobExecutionError extends CrawlServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super("JOB_EXECUTION_FAILED", message, options);
  }
}

export class WorkerExitedError extends CrawlServiceError {
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;

  constructor(slot: number, exitCode: number | null, signal: NodeJS.Signals | null) {
    const reason = signal ? `signal ${signal}` : `code ${exitCode ?? "unknown"}`;
    super("WORKER_EXITED", `Worker ${slot} exited with ${reason} while running a job`);
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export class PoolRefreshedError extends CrawlServiceError {
  constructor() {
    super("POOL_REFRESHED", "Worker pool was refreshed before the job completed");
  }
}

export class PoolShutdownError extends CrawlServiceError {
  constructor() {
    super("POOL_SHUT_DOWN", "Worker pool is shut down");
  }
}

/** A single page could not be loaded. Never fails the whole job. */
export class PageFetchError extends CrawlServiceError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(url: string, message: string, statusCode?: number) {
    super("PAGE_FETCH_FAILED", message);
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class ConfigError extends CrawlServiceError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

/** Transport-level failure that maps straight to an HTTP status. */
export class ApiError extends CrawlServiceError {
  public readonly statusCode: number;

  constructor(statusCode: number, code: string, message: string) {
    super(code, message);
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
