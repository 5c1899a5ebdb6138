import { spawn } from 'node:child_process';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandOutput>;

export class CommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

function isMissingBinary(cause: Error): boolean {
  return 'code' in cause && cause.code === 'ENOENT';
}

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (cause) => {
      if (isMissingBinary(cause)) {
        reject(new CommandError(`'${command}' was not found on PATH`, null, ''));
        return;
      }
      reject(cause);
    });

    child.on('close', (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
      const tail = stderr.trim();
      reject(new CommandError(`${command} ${reason}${tail ? `: ${tail}` : ''}`, code, stderr));
    });
  });
