import crossSpawn from 'cross-spawn';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class ProcessUtils {
  /**
   * Run a command to completion, capturing its output.
   */
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('close', (code: number | null) => {
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code ?? 1,
        });
      });

      child.on('error', (error: Error) => {
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  /**
   * Run a command attached to the current terminal and resolve with its exit
   * code. `env` replaces the inherited environment entirely.
   */
  static async interactive(
    command: string,
    args: string[],
    env: NodeJS.ProcessEnv
  ): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: process.cwd(),
        env,
        stdio: 'inherit',
      });

      child.on('close', (code: number | null) => resolve(code ?? 1));
      child.on('error', (error: Error) => {
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }
}
