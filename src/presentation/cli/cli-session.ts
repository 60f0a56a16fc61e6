import { CliExceptionHandler } from '@/presentation/filters';
import { CliIO } from './console.io';
import { EmployeeView } from './employee.view';
import { InputClosedError, Prompter } from './prompter';

/** What a menu needs to talk to the user during one run. */
export interface CliSession {
  view: EmployeeView;
  prompt: Prompter;
}

export function createSession(io: CliIO): CliSession {
  return { view: new EmployeeView(io), prompt: new Prompter(io) };
}

/**
 * Runs one menu command, printing the error line when it fails.
 * Closed input is not a command failure and is passed on to the menu loop.
 */
export async function runCommand(
  session: CliSession,
  exceptionHandler: CliExceptionHandler,
  command: () => Promise<void>,
): Promise<void> {
  try {
    await command();
  } catch (error) {
    if (error instanceof InputClosedError) {
      throw error;
    }
    session.view.error(exceptionHandler.handle(error).message);
  }
}
