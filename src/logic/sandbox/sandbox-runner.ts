export interface SandboxFile {
  name: string;
  url: string;
}

export interface SandboxRunRequest {
  code: string;
  files: SandboxFile[];
  timeoutMs: number;
}

export interface SandboxCodeError {
  name: string;
  value: string;
  traceback?: string;
}

export interface SandboxArtifact {
  mimeType: string;
  // base64 for binary formats, raw text otherwise
  data: string;
}

export interface SandboxExecution {
  stdout: string;
  stderr: string;
  error: SandboxCodeError | null;
  artifacts: SandboxArtifact[];
}

/**
 * The sandbox could not be reached or answered with a gateway error. Nothing
 * is known about whether the code ran.
 */
export class SandboxTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SandboxTransportError';
  }
}

/** The sandbox answered, but not with something we can read. */
export class SandboxProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SandboxProtocolError';
  }
}

/**
 * Isolated code execution collaborator. Code errors come back as data in
 * `SandboxExecution.error`; only transport and protocol problems throw.
 */
export abstract class SandboxRunner {
  abstract run(request: SandboxRunRequest, signal: AbortSignal): Promise<SandboxExecution>;
}
