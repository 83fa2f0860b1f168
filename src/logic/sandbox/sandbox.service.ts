import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppEnv } from '../../utils/env';
import { describeError } from '../../utils/errors';
import {
    SandboxArtifact,
    SandboxExecution,
    SandboxProtocolError,
    SandboxRunner,
    SandboxRunRequest,
    SandboxTransportError,
} from './sandbox-runner';

const GATEWAY_STATUSES = new Set([502, 503, 504]);

// stdout/stderr arrive either as one string or as the list of chunks the kernel emitted
const logSchema = z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((value) => (Array.isArray(value) ? value.join('') : value ?? ''));

const executionSchema = z.object({
    stdout: logSchema,
    stderr: logSchema,
    error: z
        .object({
            name: z.string(),
            value: z.string(),
            traceback: z.string().optional(),
        })
        .nullish(),
    results: z.array(z.record(z.string(), z.unknown())).nullish(),
});

/**
 * HTTP client for a Jupyter-style execution server:
 * `POST {SANDBOX_URL}/execute` with the code and the files it may read.
 */
@Injectable()
export class SandboxService extends SandboxRunner {
    private readonly headers: Record<string, string>;
    private readonly sandboxUrl: string;

    constructor(private readonly configService: ConfigService<AppEnv, true>) {
        super();
        this.sandboxUrl = this.configService.get('SANDBOX_URL', { infer: true }).replace(/\/+$/, '');
        const apiKey = this.configService.get('SANDBOX_API_KEY', { infer: true });
        this.headers = {
            'Content-Type': 'application/json',
            ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
        };
    }

    async run(request: SandboxRunRequest, signal: AbortSignal): Promise<SandboxExecution> {
        let resp: Response;
        try {
            resp = await fetch(`${this.sandboxUrl}/execute`, {
                method: 'POST',
                headers: this.headers,
                body: JSON.stringify({
                    language: 'python',
                    code: request.code,
                    timeoutMs: request.timeoutMs,
                    files: request.files,
                }),
                signal,
            });
        } catch (error) {
            if (signal.aborted) throw error;
            throw new SandboxTransportError(`Sandbox unreachable: ${describeError(error)}`, { cause: error });
        }

        if (!resp.ok) {
            const text = await resp.text();
            if (GATEWAY_STATUSES.has(resp.status)) {
                throw new SandboxTransportError(`Sandbox gateway error ${resp.status}: ${text}`);
            }
            throw new SandboxProtocolError(`Sandbox error ${resp.status}: ${text}`);
        }

        let body: unknown;
        try {
            body = await resp.json();
        } catch (error) {
            throw new SandboxProtocolError('Sandbox returned a non-JSON body', { cause: error });
        }
        const parsed = executionSchema.safeParse(body);
        if (!parsed.success) {
            throw new SandboxProtocolError(`Unexpected sandbox response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }

        return {
            stdout: parsed.data.stdout,
            stderr: parsed.data.stderr,
            error: parsed.data.error ?? null,
            artifacts: toArtifacts(parsed.data.results ?? []),
        };
    }
}

function toArtifacts(results: Record<string, unknown>[]): SandboxArtifact[] {
    const artifacts: SandboxArtifact[] = [];
    for (const bundle of results) {
        for (const [mimeType, data] of Object.entries(bundle)) {
            if (mimeType.includes('/') && typeof data === 'string') {
                artifacts.push({ mimeType, data });
            }
        }
    }
    return artifacts;
}
