/**
 * @file utils/command.ts
 * @description Exécution de commandes externes avec délai borné
 *
 * Pas de shell: les arguments sont passés tels quels (pas d'injection via
 * une clé publique malformée). stdin optionnel pour `wg pubkey`.
 */

import { spawn } from 'child_process';

// ============================================
// Types
// ============================================

export interface RunOptions {
  /** Délai max avant SIGKILL (ms) */
  timeoutMs?: number;
  /** Données envoyées sur stdin */
  input?: string;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandFailure = 'exit' | 'timeout' | 'not-found' | 'spawn';

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandOutput>;

/**
 * Échec d'une commande: code de sortie non nul, délai dépassé ou binaire absent
 */
export class CommandError extends Error {
  readonly command: string;
  readonly reason: CommandFailure;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    reason: CommandFailure,
    message: string,
    details: { exitCode?: number | null; stdout?: string; stderr?: string; cause?: unknown } = {}
  ) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'CommandError';
    this.command = command;
    this.reason = reason;
    this.exitCode = details.exitCode ?? null;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
  }

  /** Texte brut à remonter à l'appelant */
  get diagnostic(): string {
    return this.stderr.trim() || this.stdout.trim() || this.message;
  }
}

// ============================================
// Constants
// ============================================

export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

// ============================================
// Runner
// ============================================

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Lance une commande et résout avec stdout/stderr (rejette en CommandError)
 */
export const runCommand: CommandRunner = (file, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const command = [file, ...args].join(' ');

  return new Promise<CommandOutput>((resolve, reject) => {
    const child = spawn(file, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    // EPIPE si le processus meurt avant de lire stdin: garder le message
    child.stdin.on('error', (err) => {
      stderr += err.message;
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      const notFound = isErrnoException(err) && err.code === 'ENOENT';
      reject(
        new CommandError(
          command,
          notFound ? 'not-found' : 'spawn',
          notFound ? `Commande introuvable: ${file}` : `Impossible de lancer ${file}: ${err.message}`,
          { cause: err, stderr }
        )
      );
    });

    const rejectTimeout = () => {
      settled = true;
      reject(
        new CommandError(command, 'timeout', `${command}: délai de ${timeoutMs} ms dépassé`, {
          stdout,
          stderr,
        })
      );
    };

    // Un descendant peut garder les pipes ouverts: 'close' n'arriverait
    // qu'à sa fin, on conclut donc dès la sortie du processus tué
    child.on('exit', () => {
      if (timedOut && !settled) {
        rejectTimeout();
      }
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      if (settled) return;

      if (timedOut) {
        rejectTimeout();
        return;
      }
      settled = true;

      if (code !== 0) {
        reject(
          new CommandError(command, 'exit', `${command} a échoué (code ${code})`, {
            exitCode: code,
            stdout,
            stderr,
          })
        );
        return;
      }

      resolve({ stdout, stderr });
    });

    child.stdin.end(options.input ?? '');
  });
};
