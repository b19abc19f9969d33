import { describe, it, expect } from 'vitest';
import { CommandError, runCommand } from './command.js';

const NODE = process.execPath;

async function failure(promise: Promise<unknown>): Promise<CommandError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CommandError) return error;
    throw error;
  }
  throw new Error('échec attendu');
}

describe('runCommand', () => {
  it('collects stdout and stderr', async () => {
    const output = await runCommand(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err")']);
    expect(output).toEqual({ stdout: 'out', stderr: 'err' });
  });

  it('feeds input through stdin', async () => {
    const output = await runCommand(NODE, ['-e', 'process.stdin.pipe(process.stdout)'], { input: 'clé\n' });
    expect(output.stdout).toBe('clé\n');
  });

  it('rejects on a non-zero exit code with the raw diagnostic', async () => {
    const error = await failure(
      runCommand(NODE, ['-e', 'process.stderr.write("Invalid key\\n"); process.exit(3)'])
    );

    expect(error.reason).toBe('exit');
    expect(error.exitCode).toBe(3);
    expect(error.diagnostic).toBe('Invalid key');
  });

  it('kills the process after the timeout', async () => {
    const error = await failure(runCommand(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 }));

    expect(error.reason).toBe('timeout');
    expect(error.message).toContain('délai de 200 ms dépassé');
  });

  it('times out even when a descendant keeps the pipes open', async () => {
    const script = [
      "require('child_process').spawn(process.execPath, ['-e', 'setTimeout(() => {}, 3000)'], { stdio: 'inherit' });",
      'setTimeout(() => {}, 10000);',
    ].join(' ');
    const started = Date.now();

    const error = await failure(runCommand(NODE, ['-e', script], { timeoutMs: 300 }));

    expect(error.reason).toBe('timeout');
    expect(Date.now() - started).toBeLessThan(2500);
  });

  it('reports a missing binary', async () => {
    const error = await failure(runCommand('wgpeerd-binaire-absent', ['show']));

    expect(error.reason).toBe('not-found');
    expect(error.message).toBe('Commande introuvable: wgpeerd-binaire-absent');
  });
});
