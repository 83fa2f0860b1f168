import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content, FunctionDeclaration, GenerateContentResponse, GoogleGenAI, Schema, Type } from '@google/genai';
import { AppEnv } from '../../utils/env';
import { DeadlineExceededError, withDeadline } from '../../utils/deadline';
import { ModelTimeoutError, ModelUnavailableError, describeError } from '../../utils/errors';
import { LanguageModel, ModelReply, ModelRequest, ToolDeclaration, ToolParameterSchema } from './language-model';

const SCHEMA_TYPES: Record<ToolParameterSchema['properties'][string]['type'], Type> = {
    string: Type.STRING,
    number: Type.NUMBER,
    boolean: Type.BOOLEAN,
};

@Injectable()
export class GeminiService extends LanguageModel {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly chatModel: string;
    private readonly temperature: number;
    private readonly timeoutMs: number;

    constructor(configService: ConfigService<AppEnv, true>) {
        super();
        this.genAI = new GoogleGenAI({ apiKey: configService.get('GEMINI_API_KEY', { infer: true }) });
        this.chatModel = configService.get('GEMINI_CHAT_MODEL', { infer: true });
        this.temperature = configService.get('MODEL_TEMPERATURE', { infer: true });
        this.timeoutMs = configService.get('MODEL_TIMEOUT_MS', { infer: true });
    }

    async complete(request: ModelRequest): Promise<ModelReply> {
        const functionDeclarations = request.tools.map(toFunctionDeclaration);
        let result: GenerateContentResponse;
        try {
            result = await withDeadline(this.timeoutMs, (signal) =>
                this.genAI.models.generateContent({
                    model: this.chatModel,
                    contents: this.toContents(request),
                    config: {
                        temperature: this.temperature,
                        abortSignal: signal,
                        ...(functionDeclarations.length > 0 ? { tools: [{ functionDeclarations }] } : {}),
                    },
                }),
            );
        } catch (err) {
            if (err instanceof DeadlineExceededError) {
                this.logger.error(`complete timed out after ${this.timeoutMs} ms`);
                throw new ModelTimeoutError(this.timeoutMs, { cause: err });
            }
            this.logger.error(`complete error: ${describeError(err)}`);
            throw new ModelUnavailableError(`Failed to generate content: ${describeError(err)}`, { cause: err });
        }
        return toReply(result);
    }

    private toContents(request: ModelRequest): Content[] {
        // Gemini has no true 'system' role, so the system prompt goes in as a first user turn.
        const preamble = request.systemPrompt.trim();
        const history: Content[] = request.history.map((turn) => ({
            role: turn.role === 'assistant' ? 'model' : 'user',
            parts: [{ text: turn.text }],
        }));
        return preamble ? [{ role: 'user', parts: [{ text: preamble }] }, ...history] : history;
    }
}

function toFunctionDeclaration(tool: ToolDeclaration): FunctionDeclaration {
    const properties: Record<string, Schema> = {};
    for (const [name, property] of Object.entries(tool.parameters.properties)) {
        properties[name] = { type: SCHEMA_TYPES[property.type], description: property.description };
    }
    return {
        name: tool.name,
        description: tool.description,
        parameters: { type: Type.OBJECT, properties, required: tool.parameters.required },
    };
}

function toReply(result: GenerateContentResponse): ModelReply {
    const parts = result.candidates?.[0]?.content?.parts ?? [];
    const text = parts
        .filter((part) => typeof part.text === 'string' && !part.thought)
        .map((part) => part.text)
        .join('');
    const toolCalls = parts.flatMap((part) =>
        part.functionCall ? [{ name: part.functionCall.name ?? '', args: part.functionCall.args ?? {} }] : [],
    );
    return { text, toolCalls };
}
