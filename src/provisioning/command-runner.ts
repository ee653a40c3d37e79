import { spawn } from 'node:child_process';
import { CommandResult, CommandRunner, RunOptions } from './types.js';

/**
 * Spawns programs directly (no shell), so arguments are passed verbatim.
 */
export class ProcessCommandRunner implements CommandRunner {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    return await new Promise<CommandResult>((resolve) => {
      const child = spawn(command, [...args], {
        env: this.env,
        stdio: options.interactive ? 'inherit' : ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      const outChunks: Buffer[] = [];
      const errChunks: Buffer[] = [];
      const collect = (chunks: Buffer[]) => (data: Buffer) => {
        chunks.push(data);
        options.onOutput?.(data.toString('utf8'));
      };
      child.stdout?.on('data', collect(outChunks));
      child.stderr?.on('data', collect(errChunks));

      const finish = (exitCode: number, spawnError?: Error): void => {
        const stderr = Buffer.concat(errChunks).toString('utf8');
        resolve({
          ok: exitCode === 0,
          exitCode,
          stdout: Buffer.concat(outChunks).toString('utf8'),
          stderr: spawnError ? `${stderr}${spawnError.message}` : stderr
        });
      };

      // ENOENT for a missing binary arrives here, not as a thrown error
      child.on('error', (error: Error) => finish(127, error));
      child.on('close', (code: number | null) => finish(code ?? 1));
    });
  }
}
