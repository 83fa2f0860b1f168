import { ModelTimeoutError, ModelUnavailableError } from '../../utils/errors';
import { CODE_INTERPRETER_DECLARATION } from '../tools/tool-detector';
import { GeminiService } from './gemini.service';
import { testConfig } from '../../testing/test-config';

const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({ models: { generateContent: mockGenerateContent } })),
  Type: { STRING: 'STRING', NUMBER: 'NUMBER', BOOLEAN: 'BOOLEAN', OBJECT: 'OBJECT' },
}));

describe('GeminiService', () => {
  beforeEach(() => {
    mockGenerateContent.mockReset();
  });

  it('sends the system prompt first and maps assistant turns to the model role', async () => {
    const service = new GeminiService(testConfig());
    mockGenerateContent.mockResolvedValue({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] });

    await service.complete({
      systemPrompt: 'Be brief.',
      history: [
        { role: 'user', text: 'hi' },
        { role: 'assistant', text: 'hello' },
      ],
      tools: [],
    });

    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'gemini-2.5-flash-lite',
      contents: [
        { role: 'user', parts: [{ text: 'Be brief.' }] },
        { role: 'user', parts: [{ text: 'hi' }] },
        { role: 'model', parts: [{ text: 'hello' }] },
      ],
      config: { temperature: 0.1, abortSignal: expect.any(AbortSignal) },
    });
  });

  it('declares tools as function declarations', async () => {
    const service = new GeminiService(testConfig({ GEMINI_CHAT_MODEL: 'gemini-test', MODEL_TEMPERATURE: 0 }));
    mockGenerateContent.mockResolvedValue({ candidates: [] });

    await service.complete({ systemPrompt: '', history: [{ role: 'user', text: 'hi' }], tools: [CODE_INTERPRETER_DECLARATION] });

    const [params] = mockGenerateContent.mock.calls[0];
    expect(params.model).toBe('gemini-test');
    expect(params.contents).toEqual([{ role: 'user', parts: [{ text: 'hi' }] }]);
    expect(params.config.temperature).toBe(0);
    expect(params.config.tools).toEqual([
      {
        functionDeclarations: [
          {
            name: 'code_interpreter',
            description: CODE_INTERPRETER_DECLARATION.description,
            parameters: {
              type: 'OBJECT',
              properties: { code: { type: 'STRING', description: 'Python code to execute.' } },
              required: ['code'],
            },
          },
        ],
      },
    ]);
  });

  it('collects text and function calls, skipping thoughts', async () => {
    const service = new GeminiService(testConfig());
    mockGenerateContent.mockResolvedValue({
      candidates: [
        {
          content: {
            parts: [
              { text: 'Let me ' },
              { text: 'planning...', thought: true },
              { functionCall: { name: 'code_interpreter', args: { code: 'print(1)' } } },
              { text: 'check.' },
            ],
          },
        },
      ],
    });

    await expect(service.complete({ systemPrompt: '', history: [], tools: [] })).resolves.toEqual({
      text: 'Let me check.',
      toolCalls: [{ name: 'code_interpreter', args: { code: 'print(1)' } }],
    });
  });

  it('returns an empty reply when there is no candidate', async () => {
    const service = new GeminiService(testConfig());
    mockGenerateContent.mockResolvedValue({});

    await expect(service.complete({ systemPrompt: '', history: [], tools: [] })).resolves.toEqual({ text: '', toolCalls: [] });
  });

  it('wraps provider failures as ModelUnavailableError', async () => {
    const service = new GeminiService(testConfig());
    mockGenerateContent.mockRejectedValue(new Error('quota exceeded'));

    const attempt = service.complete({ systemPrompt: '', history: [], tools: [] });

    await expect(attempt).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(attempt).rejects.toThrow('Failed to generate content: quota exceeded');
  });

  it('gives up after MODEL_TIMEOUT_MS', async () => {
    const service = new GeminiService(testConfig({ MODEL_TIMEOUT_MS: 20 }));
    mockGenerateContent.mockReturnValue(new Promise(() => undefined));

    const attempt = service.complete({ systemPrompt: '', history: [], tools: [] });

    await expect(attempt).rejects.toBeInstanceOf(ModelTimeoutError);
    await expect(attempt).rejects.toThrow('Model did not respond within 20 ms');
  });
});
