import { CliIO } from './console.io';
import { InputClosedError, Prompter } from './prompter';

class ScriptedIO implements CliIO {
  readonly questions: string[] = [];
  readonly lines: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  print(text = ''): void {
    this.lines.push(text);
  }

  close(): void {}
}

describe('Prompter', () => {
  it('should trim answers', async () => {
    const io = new ScriptedIO(['  John  ']);

    expect(await new Prompter(io).text('First Name: ')).toBe('John');
    expect(io.questions).toEqual(['First Name: ']);
  });

  it('should throw InputClosedError once input has ended', async () => {
    await expect(new Prompter(new ScriptedIO([])).text('First Name: ')).rejects.toThrow(InputClosedError);
  });

  it('should re-prompt until a required answer is given', async () => {
    const io = new ScriptedIO(['', '   ', 'John']);

    expect(await new Prompter(io).required('First Name: ', 'First name')).toBe('John');
    expect(io.lines).toEqual(['ERROR: First name cannot be empty.', 'ERROR: First name cannot be empty.']);
  });

  describe('number', () => {
    it('should accept currency formatting', async () => {
      expect(await new Prompter(new ScriptedIO(['$55,000.50'])).number('Salary: ', 'Salary')).toBe(55000.5);
    });

    it('should re-prompt on invalid numbers', async () => {
      const io = new ScriptedIO(['abc', '-5', '2.5', '3']);

      expect(await new Prompter(io).number('Team Size: ', 'Team size', { integer: true })).toBe(3);
      expect(io.lines).toEqual([
        'ERROR: Team size must be a non-negative number.',
        'ERROR: Team size must be a non-negative number.',
        'ERROR: Team size must be a whole number.',
      ]);
    });

    it('should return the default for an empty answer', async () => {
      expect(await new Prompter(new ScriptedIO([''])).number('Salary [0]: ', 'Salary', { defaultValue: 0 })).toBe(0);
    });

    it('should require an answer without a default', async () => {
      const io = new ScriptedIO(['', '10']);

      expect(await new Prompter(io).number('Salary: ', 'Salary')).toBe(10);
      expect(io.lines).toEqual(['ERROR: Salary must be a non-negative number.']);
    });
  });

  it('should re-prompt until a listed choice is entered', async () => {
    const io = new ScriptedIO(['7', '2']);

    expect(await new Prompter(io).choice('Select (1-2): ', ['1', '2'])).toBe('2');
    expect(io.lines).toEqual(['ERROR: Invalid choice. Please enter 1, 2.']);
  });

  describe('confirm', () => {
    it('should accept yes and no in any case', async () => {
      expect(await new Prompter(new ScriptedIO(['YES'])).confirm('Delete?')).toBe(true);
      expect(await new Prompter(new ScriptedIO(['n'])).confirm('Delete?')).toBe(false);
    });

    it('should re-prompt on other answers', async () => {
      const io = new ScriptedIO(['maybe', 'y']);

      expect(await new Prompter(io).confirm('Delete?')).toBe(true);
      expect(io.questions).toEqual(['Delete? (y/n): ', 'Delete? (y/n): ']);
      expect(io.lines).toEqual(["Please enter 'y' or 'n'."]);
    });
  });
});
