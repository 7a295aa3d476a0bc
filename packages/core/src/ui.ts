import { UsageError } from '@patchloop/shared';

/**
 * Interaction with the person running a session.
 */
export interface UserInterface {
  confirm(message: string): Promise<boolean>;
}

/**
 * Fails any question; used when there is no terminal to ask.
 */
export class NoopUserInterface implements UserInterface {
  async confirm(_message: string): Promise<boolean> {
    throw new UsageError('Cannot confirm in non-interactive mode.');
  }
}
