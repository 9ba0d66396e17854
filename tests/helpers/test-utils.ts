import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { SimulationEngine } from '../../src/modules/simulation-engine';
import { EngineError } from '../../src/utils/error-handling';

/**
 * Creates a temporary directory for testing
 */
export function createTempDirectory(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'dta-sens-test-'));
}

export function cleanupTempDirectory(dirPath: string): void {
  if (fs.existsSync(dirPath)) {
    fs.rmSync(dirPath, { recursive: true, force: true });
  }
}

/**
 * Creates a test file with given content
 */
export function createTestFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

export function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, 'utf8').trimEnd().split('\n');
}

/**
 * In-process stand-in for the traffic assignment engine: writes fixed output
 * tables into whichever directory it is run against.
 */
export class FixtureEngine implements SimulationEngine {
  readonly name = 'fixture';
  readonly runs: string[] = [];

  constructor(
    private readonly outputs: Record<string, Record<string, string>>,
    private readonly failOn: string[] = []
  ) {}

  async run(workingDir: string): Promise<void> {
    this.runs.push(workingDir);
    if (this.failOn.includes(workingDir)) {
      throw new EngineError(workingDir, 'exited with code 1', 1, ['assignment did not converge']);
    }
    const files = this.outputs[workingDir] ?? {};
    for (const [fileName, content] of Object.entries(files)) {
      createTestFile(path.join(workingDir, fileName), content);
    }
  }
}
