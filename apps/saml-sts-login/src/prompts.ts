/**
 * Terminal prompts for the login flow. Everything is written to stderr so
 * stdout carries only the credentials.
 *
 * @packageDocumentation
 */

import { createInterface } from 'node:readline/promises';
import { Writable } from 'node:stream';
import type { Device, LoginPrompts } from '@saml-sts/assertion-sdk';

/**
 * Prompts for one login run. Call `close` when done so stdin is released.
 */
export interface TerminalPrompts extends LoginPrompts {
  /** Reads a password without echoing it */
  readonly readPassword: () => Promise<string>;
  readonly close: () => void;
}

export interface TerminalPromptsOptions {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
  /** Rejects a pending question when aborted */
  readonly signal?: AbortSignal;
  /** Called on Ctrl-C; the raw-mode terminal delivers it to readline, not the process */
  readonly onInterrupt?: () => void;
}

/**
 * Formats the device menu, one numbered entry per line.
 *
 * @example
 * ```typescript
 * formatDeviceMenu([{ deviceId: 42, deviceType: 'OneLogin Protect', requiresOtpToken: true }]);
 * // => '  [0] OneLogin Protect (42)\n'
 * ```
 */
export const formatDeviceMenu = (devices: readonly Device[]): string =>
  devices
    .map((device, index) => `  [${String(index)}] ${device.deviceType} (${String(device.deviceId)})\n`)
    .join('');

/**
 * Parses a device choice. Anything but a plain number is rejected.
 */
export const parseDeviceChoice = (answer: string): number => {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`"${trimmed}" is not a device number`);
  }
  return Number.parseInt(trimmed, 10);
};

/**
 * Creates prompts that read from stdin and write to stderr.
 *
 * @param options - Streams to use instead of stdin and stderr
 * @returns TerminalPrompts instance
 */
export const createTerminalPrompts = (options: TerminalPromptsOptions = {}): TerminalPrompts => {
  const { input = process.stdin, output = process.stderr, signal, onInterrupt } = options;
  const questionOptions = signal !== undefined ? { signal } : {};

  // readline echoes typed characters through this stream; muting it hides the password
  let muted = false;
  const echo = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      if (!muted) {
        output.write(chunk);
      }
      callback();
    },
  });

  const terminal = 'isTTY' in input && input.isTTY === true;
  const rl = createInterface({ input, output: echo, terminal });
  rl.on('SIGINT', () => {
    onInterrupt?.();
  });

  const chooseDevice = async (devices: readonly Device[]): Promise<number> => {
    output.write('Choose an MFA device:\n');
    output.write(formatDeviceMenu(devices));
    const answer = await rl.question(`Device [0-${String(devices.length - 1)}]: `, questionOptions);
    return parseDeviceChoice(answer);
  };

  const requestOtp = async (device: Device): Promise<string> => {
    const answer = await rl.question(`One-time code for ${device.deviceType}: `, questionOptions);
    return answer.trim();
  };

  const readPassword = async (): Promise<string> => {
    output.write('Password: ');
    muted = true;
    try {
      return await rl.question('', questionOptions);
    } finally {
      muted = false;
      output.write('\n');
    }
  };

  const close = (): void => {
    rl.close();
  };

  return {
    chooseDevice,
    requestOtp,
    readPassword,
    close,
  };
};
