import { MockTextGenerator } from '../../llm/mock-generator';

describe('MockTextGenerator', () => {
  it('returns the configured response', async () => {
    const generator = new MockTextGenerator({ response: 'ok' });
    const result = await generator.generate({ messages: [{ role: 'user', content: 'Hello' }] });

    expect(result.content).toBe('ok');
    expect(result.tokensUsed).toBe(2);
    expect(generator.model).toBe('mock');
  });

  it('delegates to a custom generate function', async () => {
    const generator = new MockTextGenerator({
      generateFn: (input) => `echo: ${input.messages[input.messages.length - 1]?.content}`
    });

    const result = await generator.generate({
      messages: [{ role: 'system', content: 'ctx' }, { role: 'user', content: 'where?' }]
    });

    expect(result.content).toBe('echo: where?');
  });

  it('rejects empty prompts', async () => {
    const generator = new MockTextGenerator();

    await expect(generator.generate({ messages: [] })).rejects.toThrow('Prompt messages are required');
  });

  it('guards against oversized inputs', async () => {
    const generator = new MockTextGenerator({ maxInputLength: 10 });

    await expect(
      generator.generate({ messages: [{ role: 'user', content: 'a'.repeat(50) }] })
    ).rejects.toThrow('Prompt exceeds maximum length');
  });
});
