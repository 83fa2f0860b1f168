import { Message } from '../entities';

export interface EnhancedOutput {
    stdout?: string;
    stderr?: string;
    error?: string;
    visualization?: string;
}

// Shape callers consume; kept separate from Message so the wire names can differ
export interface MessageView {
    type: 'human' | 'ai';
    content: string;
    enhanced_output?: EnhancedOutput;
}

export interface TurnResponse {
    sessionId: string;
    messages: MessageView[];
}

export function toMessageView(message: Message): MessageView {
    const view: MessageView = {
        type: message.role === 'human' ? 'human' : 'ai',
        content: message.content,
    };
    const result = message.executionResult;
    if (!result) {
        return view;
    }
    if (result.status === 'failure') {
        view.enhanced_output = { error: result.error };
        return view;
    }
    const output: EnhancedOutput = { stdout: result.stdout };
    if (result.stderr) output.stderr = result.stderr;
    if (result.visualization) output.visualization = result.visualization;
    view.enhanced_output = output;
    return view;
}
