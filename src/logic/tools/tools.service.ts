import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionResult, ExecutionSuccess, FileUpload } from '../../entities';
import { AppEnv } from '../../utils/env';
import { DeadlineExceededError, withDeadline } from '../../utils/deadline';
import { describeError } from '../../utils/errors';
import { SandboxExecution, SandboxRunRequest, SandboxRunner, SandboxTransportError } from '../sandbox/sandbox-runner';

/**
 * Sends code to the sandbox and turns whatever happens into one
 * ExecutionResult. Does not throw; failures come back as a failure record.
 */
@Injectable()
export class ToolsService {
  private readonly logger = new Logger(ToolsService.name);
  private readonly timeoutMs: number;
  private readonly transportRetries: number;

  constructor(
    private readonly sandbox: SandboxRunner,
    configService: ConfigService<AppEnv, true>,
  ) {
    this.timeoutMs = configService.get('SANDBOX_TIMEOUT_MS', { infer: true });
    this.transportRetries = configService.get('SANDBOX_TRANSPORT_RETRIES', { infer: true });
  }

  async dispatch(code: string, files: FileUpload[]): Promise<ExecutionResult> {
    const request: SandboxRunRequest = {
      code,
      files: files.map((file) => ({ name: file.name, url: file.storageRef })),
      timeoutMs: this.timeoutMs,
    };

    try {
      // one deadline covers every attempt
      const execution = await withDeadline(this.timeoutMs, (signal) => this.runWithRetries(request, signal));
      const result = toExecutionResult(execution);
      this.logger.log(`Code execution finished with ${result.status}`);
      return result;
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        this.logger.warn(`Code execution timed out after ${this.timeoutMs} ms`);
        return {
          status: 'failure',
          errorKind: 'timeout',
          error: `TimeoutError: execution timed out after ${this.timeoutMs / 1000}s`,
        };
      }
      this.logger.error(`Code execution could not complete: ${describeError(error)}`);
      return { status: 'failure', errorKind: 'transport', error: `SandboxError: ${describeError(error)}` };
    }
  }

  private async runWithRetries(request: SandboxRunRequest, signal: AbortSignal): Promise<SandboxExecution> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.sandbox.run(request, signal);
      } catch (error) {
        // code and protocol errors are never retried
        if (error instanceof SandboxTransportError && attempt < this.transportRetries && !signal.aborted) {
          this.logger.warn(`Retrying code execution after transport failure: ${error.message}`);
          continue;
        }
        throw error;
      }
    }
  }
}

function toExecutionResult(execution: SandboxExecution): ExecutionResult {
  if (execution.error) {
    const { name, value, traceback } = execution.error;
    return { status: 'failure', errorKind: 'execution', error: traceback?.trim() || `${name}: ${value}` };
  }
  const result: ExecutionSuccess = { status: 'success', stdout: execution.stdout };
  if (execution.stderr) {
    result.stderr = execution.stderr;
  }
  const image = execution.artifacts.find((artifact) => artifact.mimeType.startsWith('image/'));
  if (image) {
    result.visualization = toDataUri(image.mimeType, image.data);
  }
  return result;
}

function toDataUri(mimeType: string, data: string): string {
  // svg comes back as markup, raster formats already base64-encoded
  const base64 = mimeType === 'image/svg+xml' ? Buffer.from(data, 'utf-8').toString('base64') : data;
  return `data:${mimeType};base64,${base64}`;
}
