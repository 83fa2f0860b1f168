import { ModelReply, ToolDeclaration } from '../gemini/language-model';

export const CODE_INTERPRETER_TOOL = 'code_interpreter';

export const CODE_INTERPRETER_DECLARATION: ToolDeclaration = {
  name: CODE_INTERPRETER_TOOL,
  description: 'Execute python code in a Jupyter cell and return outputs (e.g. plots, stdout, stderr).',
  parameters: {
    type: 'object',
    properties: {
      code: { type: 'string', description: 'Python code to execute.' },
    },
    required: ['code'],
  },
};

export interface ToolInvocation {
  code: string;
  // index the assistant Message carrying the result will have in history
  detectedAtMessageIndex: number;
}

export type Detection =
  | { kind: 'none' }
  | { kind: 'invocation'; invocation: ToolInvocation; candidates: number }
  | { kind: 'malformed'; reason: string; candidates: number };

/**
 * Decides whether a model reply asks for code execution. Same reply in, same
 * detection out; only the first candidate is ever executed.
 */
export abstract class ToolInvocationDetector {
  /** Tools the model has to be told about for this detector to see anything. */
  abstract readonly tools: ToolDeclaration[];

  abstract detect(reply: ModelReply, messageIndex: number): Detection;
}

/** Reads structured tool calls surfaced by the model adapter. */
export class FunctionCallDetector extends ToolInvocationDetector {
  readonly tools = [CODE_INTERPRETER_DECLARATION];

  detect(reply: ModelReply, messageIndex: number): Detection {
    const calls = reply.toolCalls.filter((call) => call.name === CODE_INTERPRETER_TOOL);
    if (calls.length === 0) {
      return { kind: 'none' };
    }
    const code = calls[0].args.code;
    if (typeof code !== 'string' || !code.trim()) {
      return { kind: 'malformed', reason: 'code_interpreter call without code', candidates: calls.length };
    }
    return { kind: 'invocation', invocation: { code, detectedAtMessageIndex: messageIndex }, candidates: calls.length };
  }
}

// Only blocks tagged python/py are a request to run; bare or other-language fences are just text.
const FENCE_PATTERN = /```(?:python|py)[^\S\r\n]*\r?\n([\s\S]*?)```/gi;

/** Parses fenced python blocks out of the reply text. */
export class FencedCodeDetector extends ToolInvocationDetector {
  readonly tools: ToolDeclaration[] = [];

  detect(reply: ModelReply, messageIndex: number): Detection {
    const matches = [...reply.text.matchAll(FENCE_PATTERN)];
    if (matches.length === 0) {
      return { kind: 'none' };
    }
    const code = matches[0][1].trimEnd();
    if (!code.trim()) {
      return { kind: 'malformed', reason: 'empty python block', candidates: matches.length };
    }
    return { kind: 'invocation', invocation: { code, detectedAtMessageIndex: messageIndex }, candidates: matches.length };
  }
}
