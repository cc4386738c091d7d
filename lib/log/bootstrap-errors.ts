import { appLogger } from './logger';
import { redactText } from './redact';

export type ErrorChannel = 'server' | 'cli';

export interface ErrorDescription {
  message: string;
  stack?: string;
  name?: string;
}

const INSTALLED_CHANNELS = Symbol.for('cookie-console.log.error-hooks');

function readString(input: object, key: string): string | undefined {
  const value: unknown = Reflect.get(input, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Message, stack and name of anything thrown, with cookie values masked. */
export function describeError(input: unknown): ErrorDescription {
  if (input instanceof Error) {
    return {
      message: redactText(input.message || input.name || 'Error'),
      stack: input.stack ? redactText(input.stack) : undefined,
      name: input.name,
    };
  }
  if (typeof input === 'string' && input.length > 0) {
    return { message: redactText(input) };
  }
  if (input && typeof input === 'object') {
    const stack = readString(input, 'stack');
    return {
      message: redactText(readString(input, 'message') ?? String(input)),
      stack: stack ? redactText(stack) : undefined,
      name: readString(input, 'name'),
    };
  }
  return { message: input ? redactText(String(input)) : 'Unknown error' };
}

function claimChannel(channel: ErrorChannel): boolean {
  const existing: unknown = Reflect.get(globalThis, INSTALLED_CHANNELS);
  const installed = existing instanceof Set ? existing : new Set<unknown>();
  if (installed.has(channel)) {
    return false;
  }
  installed.add(channel);
  Reflect.set(globalThis, INSTALLED_CHANNELS, installed);
  return true;
}

/**
 * Logs uncaught exceptions and unhandled rejections once per channel.
 * Returns false when the hooks were already installed.
 */
export function installGlobalErrorHooks(channel: ErrorChannel = 'server'): boolean {
  if (!claimChannel(channel)) {
    return false;
  }

  process.on('uncaughtException', (error: Error) => {
    const { message, stack, name } = describeError(error);
    appLogger.error(`${channel}_uncaught_exception`, message, { channel, stack, name, isFatal: true });
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const { message, stack, name } = describeError(reason);
    appLogger.error(`${channel}_unhandled_rejection`, message, {
      channel,
      stack,
      name,
      isFatal: false,
      reasonType: reason === null ? 'null' : typeof reason,
    });
  });
  return true;
}
