import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InquirerPrompter } from '../src/cli/Prompter.js';
import { CancelledError } from '../src/utils/ErrorHandler.js';

const inquirer = vi.hoisted(() => ({ prompt: vi.fn() }));

vi.mock('inquirer', () => ({ default: inquirer }));

describe('InquirerPrompter', () => {
  beforeEach(() => {
    inquirer.prompt.mockReset();
  });

  it('returns the trimmed answer', async () => {
    inquirer.prompt.mockResolvedValue({ value: '  https://mastodon.example  ' });

    const answer = await new InquirerPrompter().input('URL:', { default: 'https://mastodon.social' });

    expect(answer).toBe('https://mastodon.example');
    expect(inquirer.prompt).toHaveBeenCalledWith([
      { type: 'input', name: 'value', message: 'URL:', default: 'https://mastodon.social' }
    ]);
  });

  it('masks secret answers', async () => {
    inquirer.prompt.mockResolvedValue({ value: 'test-code' });

    await new InquirerPrompter().input('Código:', { secret: true });

    expect(inquirer.prompt).toHaveBeenCalledWith([
      { type: 'password', name: 'value', message: 'Código:', mask: '*' }
    ]);
  });

  it('turns Ctrl+C into a cancellation', async () => {
    inquirer.prompt.mockRejectedValue(Object.assign(new Error('User force closed the prompt'), { name: 'ExitPromptError' }));

    const error = await new InquirerPrompter().input('URL:').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ exitCode: 130 });
  });
});
