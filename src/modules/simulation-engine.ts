/**
 * @file Simulation Invoker: runs the external traffic assignment engine against a
 *       working directory. DTALite reads node.csv, link.csv, etc. from its working
 *       directory and writes link_performance.csv and od_performance.csv back to it.
 *       The directory is passed to the child process explicitly; the process-wide
 *       working directory is never changed.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import { EngineConfig } from '../config';
import { EngineError, getErrorMessage } from '../utils/error-handling';
import { getLogger, Logger } from '../utils/logger';

export interface SimulationEngine {
  readonly name: string;
  /** Resolves once the engine has written its outputs into `workingDir`. */
  run(workingDir: string): Promise<void>;
}

const STDERR_TAIL_LINES = 20;

export class DTALiteEngine implements SimulationEngine {
  readonly name = 'dtalite';
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(config: EngineConfig) {
    this.config = config;
    this.logger = getLogger('DTALiteEngine');
  }

  buildInvocation(): { command: string; args: string[] } {
    const { pythonCommand, module, entryPoint } = this.config;
    return {
      command: pythonCommand,
      args: ['-c', `import ${module} as dta; dta.${entryPoint}()`],
    };
  }

  async run(workingDir: string): Promise<void> {
    try {
      fs.mkdirSync(workingDir, { recursive: true });
    } catch (error) {
      throw new EngineError(workingDir, `cannot create working directory: ${getErrorMessage(error)}`, null, [], error);
    }

    const { command, args } = this.buildInvocation();
    this.logger.info(`Running DTALite simulation in: ${workingDir}`, { command });

    await new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { cwd: workingDir, stdio: ['ignore', 'pipe', 'pipe'] });
      const stderrTail: string[] = [];
      let settled = false;

      const pending = { stdout: '', stderr: '' };

      const emitLine = (stream: 'stdout' | 'stderr', line: string) => {
        if (!line.trim()) return;
        this.logger.debug(`engine ${stream}`, { line });
        if (stream === 'stderr') {
          stderrTail.push(line);
          if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
        }
      };

      // A chunk may end mid-line; the unfinished piece waits for the next chunk.
      const forward = (stream: 'stdout' | 'stderr') => (data: Buffer) => {
        const lines = (pending[stream] + data.toString()).split(/\r?\n/);
        pending[stream] = lines.pop() ?? '';
        lines.forEach((line) => emitLine(stream, line));
      };

      const flush = () => {
        emitLine('stdout', pending.stdout);
        emitLine('stderr', pending.stderr);
        pending.stdout = '';
        pending.stderr = '';
      };

      child.stdout?.on('data', forward('stdout'));
      child.stderr?.on('data', forward('stderr'));

      child.on('error', (error: Error) => {
        if (settled) return;
        settled = true;
        flush();
        reject(new EngineError(workingDir, `failed to start '${command}': ${error.message}`, null, stderrTail, error));
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        flush();
        if (code === 0) {
          resolve();
          return;
        }
        const reason = signal ? `terminated by ${signal}` : `exited with code ${code}`;
        reject(new EngineError(workingDir, reason, code, stderrTail));
      });
    });

    this.logger.info(`DTALite simulation finished in: ${workingDir}`);
  }
}
