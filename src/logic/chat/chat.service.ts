import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionResult, FileUpload, Message, Session } from '../../entities';
import { AppEnv, MessageLayout, ToolDetectorKind, TurnConcurrency } from '../../utils/env';
import { ModelUnavailableError, TurnError, describeError } from '../../utils/errors';
import { toMessageView } from '../../utils/types';
import { SessionStore } from '../chat-memory/session-store';
import { TurnLockService } from '../chat-memory/turn-lock.service';
import { FileUploadService, IncomingFile } from '../file-upload/file-upload.service';
import { LanguageModel, ModelReply, ModelTurn, ToolDeclaration } from '../gemini/language-model';
import { SocketGateway } from '../socket-gateway/socket.gateway';
import { ToolInvocation, ToolInvocationDetector } from '../tools/tool-detector';
import { ToolsService } from '../tools/tools.service';
import { followUpPrompt, systemPrompt } from './prompt';

export enum TurnState {
    AWAITING_MODEL = 'AWAITING_MODEL',
    MODEL_RESPONDED = 'MODEL_RESPONDED',
    DISPATCHING_TOOL = 'DISPATCHING_TOOL',
    DONE = 'DONE',
}

/**
 * Runs one turn per call as a small state machine:
 * AWAITING_MODEL -> MODEL_RESPONDED -> (DISPATCHING_TOOL) -> DONE.
 *
 * Turns for the same session run one at a time; different sessions never
 * wait on each other.
 */
@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly detectorKind: ToolDetectorKind;
    private readonly concurrency: TurnConcurrency;
    private readonly layout: MessageLayout;
    private readonly followUp: boolean;

    constructor(
        private readonly sessionStore: SessionStore,
        private readonly turnLock: TurnLockService,
        private readonly languageModel: LanguageModel,
        private readonly detector: ToolInvocationDetector,
        private readonly toolsService: ToolsService,
        private readonly fileUploadService: FileUploadService,
        private readonly socketGateway: SocketGateway,
        configService: ConfigService<AppEnv, true>,
    ) {
        this.detectorKind = configService.get('TOOL_DETECTOR', { infer: true });
        this.concurrency = configService.get('TURN_CONCURRENCY', { infer: true });
        this.layout = configService.get('MESSAGE_LAYOUT', { infer: true });
        this.followUp = configService.get('FOLLOW_UP_AFTER_EXECUTION', { infer: true });
    }

    /** Returns the assistant Messages this turn appended. */
    submitTurn(sessionId: string, prompt: string): Promise<Message[]> {
        return this.turnLock.runExclusive(sessionId, () => this.runTurn(sessionId, prompt), this.concurrency);
    }

    /** Waits for any running turn of the session, then empties it. */
    clearSession(sessionId: string): Promise<void> {
        return this.turnLock.runExclusive(sessionId, async () => {
            this.sessionStore.reset(sessionId);
            this.logger.log(`Cleared session ${sessionId}`);
        });
    }

    /**
     * Stores each file and records it on the session. Files that are too large
     * or fail to store are skipped; the rest are returned.
     */
    async registerFiles(sessionId: string, files: IncomingFile[]): Promise<FileUpload[]> {
        const registered: FileUpload[] = [];
        for (const file of files) {
            if (file.size > this.fileUploadService.maxBytes) {
                this.logger.warn(`Skipping ${file.originalname}: ${file.size} bytes exceeds ${this.fileUploadService.maxBytes}`);
                continue;
            }
            let upload: FileUpload;
            try {
                upload = await this.fileUploadService.saveFileUpload(file);
            } catch (error) {
                this.logger.warn(`Skipping ${file.originalname}: ${describeError(error)}`);
                continue;
            }
            this.sessionStore.registerUpload(sessionId, upload);
            registered.push(upload);
        }
        this.logger.log(`Registered ${registered.length}/${files.length} files for session ${sessionId}`);
        return registered;
    }

    getHistory(sessionId: string): readonly Message[] {
        return this.sessionStore.snapshot(sessionId)?.history ?? [];
    }

    private async runTurn(sessionId: string, prompt: string): Promise<Message[]> {
        const session = this.sessionStore.getOrCreate(sessionId);
        const humanIndex = session.append(Message.human(prompt));

        try {
            this.enter(sessionId, TurnState.AWAITING_MODEL);
            const reply = await this.callModel(session, this.detector.tools);

            this.enter(sessionId, TurnState.MODEL_RESPONDED);
            const detection = this.detector.detect(reply, this.resultIndex(session, reply));
            if (detection.kind === 'malformed') {
                this.logger.warn(`Ignoring malformed code invocation in session ${sessionId}: ${detection.reason}`);
            } else if (detection.kind === 'invocation' && detection.candidates > 1) {
                this.logger.warn(`Reply held ${detection.candidates} code candidates; executing only the first`);
            }

            if (detection.kind !== 'invocation') {
                session.append(Message.assistant(reply.text));
            } else {
                this.enter(sessionId, TurnState.DISPATCHING_TOOL);
                const result = await this.toolsService.dispatch(detection.invocation.code, session.uploadedFiles);
                this.appendExecution(session, reply, detection.invocation, result);
                if (this.followUp) {
                    await this.appendFollowUp(session);
                }
            }

            this.enter(sessionId, TurnState.DONE);
            const appended = session.history.slice(humanIndex + 1);
            this.socketGateway.emitToSession(sessionId, {
                event: 'turn.completed',
                data: { sessionId, messages: appended.map(toMessageView) },
            });
            return appended;
        } catch (error) {
            this.logger.error(`Turn failed for session ${sessionId}: ${describeError(error)}`);
            this.socketGateway.emitToSession(sessionId, {
                event: 'turn.failed',
                data: { sessionId, error: describeError(error) },
            });
            throw error;
        }
    }

    private async callModel(session: Session, tools: ToolDeclaration[], extraTurns: ModelTurn[] = []): Promise<ModelReply> {
        try {
            return await this.languageModel.complete({
                systemPrompt: systemPrompt(this.detectorKind, session.uploadedFiles),
                history: [...session.history.map(toModelTurn), ...extraTurns],
                tools,
            });
        } catch (error) {
            if (error instanceof TurnError) {
                throw error;
            }
            throw new ModelUnavailableError(`Language model failed: ${describeError(error)}`, { cause: error });
        }
    }

    // where the Message carrying the execution result will land
    private resultIndex(session: Session, reply: ModelReply): number {
        const textFirst = this.layout === 'split' && reply.text.trim().length > 0;
        return session.history.length + (textFirst ? 1 : 0);
    }

    private appendExecution(session: Session, reply: ModelReply, invocation: ToolInvocation, result: ExecutionResult) {
        const codeBlock = fencedPython(invocation.code);
        if (this.layout === 'split') {
            if (reply.text.trim()) {
                session.append(Message.assistant(reply.text));
            }
            session.append(Message.assistant(codeBlock, result));
            return;
        }
        // fenced replies already carry the code in their text
        const content = this.detectorKind === 'fenced' ? reply.text : joinText(reply.text, codeBlock);
        session.append(Message.assistant(content, result));
    }

    private async appendFollowUp(session: Session) {
        this.enter(session.sessionId, TurnState.AWAITING_MODEL);
        let reply: ModelReply;
        try {
            reply = await this.callModel(session, [], [{ role: 'user', text: followUpPrompt() }]);
        } catch (error) {
            this.logger.error(`Follow-up explanation failed for session ${session.sessionId}: ${describeError(error)}`);
            return;
        }
        this.enter(session.sessionId, TurnState.MODEL_RESPONDED);
        if (reply.text.trim()) {
            session.append(Message.assistant(reply.text));
        }
    }

    private enter(sessionId: string, state: TurnState) {
        this.logger.debug(`Session ${sessionId} -> ${state}`);
        this.socketGateway.emitToSession(sessionId, { event: 'turn.state', data: { sessionId, state } });
    }
}

function toModelTurn(message: Message): ModelTurn {
    if (message.role === 'human') {
        return { role: 'user', text: message.content };
    }
    const result = message.executionResult;
    if (!result) {
        return { role: 'assistant', text: message.content };
    }
    // images stay out of the prompt
    const report =
        result.status === 'success'
            ? { stdout: result.stdout, stderr: result.stderr ?? '' }
            : { error: result.error };
    return { role: 'assistant', text: joinText(message.content, `Execution result: ${JSON.stringify(report)}`) };
}

function fencedPython(code: string): string {
    return '```python\n' + code + '\n```';
}

function joinText(head: string, tail: string): string {
    return head.trim() ? `${head}\n\n${tail}` : tail;
}
