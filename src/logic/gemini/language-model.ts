export interface ModelTurn {
    role: 'user' | 'assistant';
    text: string;
}

// JSON-schema subset every provider we target understands
export interface ToolParameterSchema {
    type: 'object';
    properties: Record<string, { type: 'string' | 'number' | 'boolean'; description: string }>;
    required: string[];
}

export interface ToolDeclaration {
    name: string;
    description: string;
    parameters: ToolParameterSchema;
}

export interface ModelToolCall {
    name: string;
    args: Record<string, unknown>;
}

export interface ModelRequest {
    systemPrompt: string;
    history: ModelTurn[];
    tools: ToolDeclaration[];
}

export interface ModelReply {
    text: string;
    toolCalls: ModelToolCall[];
}

/**
 * Chat-completion collaborator. Implementations throw ModelTimeoutError when
 * their time budget runs out and ModelUnavailableError for anything else.
 */
export abstract class LanguageModel {
    abstract complete(request: ModelRequest): Promise<ModelReply>;
}
