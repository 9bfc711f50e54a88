import { spawn } from 'node:child_process';

export interface TraceRunRequest {
  /** Absolute path of the script to execute */
  script: string;
  /** Arguments passed to the script */
  args: string[];
  /** Extra Node.js flags placed before the script, e.g. a loader */
  nodeArgs: string[];
  /** Directory the V8 coverage JSON files must be written to */
  coverageDir: string;
  /** Directory the .cpuprofile files must be written to */
  profileDir: string;
  cwd: string;
}

export interface TraceRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/** Executes a script under tracing and leaves the raw V8 output in the requested directories */
export interface TraceRunner {
  run(request: TraceRunRequest): Promise<TraceRunResult>;
}

/**
 * Runs the script in a child Node.js process with precise coverage
 * (NODE_V8_COVERAGE) and the sampling CPU profiler enabled. Waits for the
 * process to exit; there is no timeout. A non-zero exit is reported, not
 * raised.
 */
export class NodeTraceRunner implements TraceRunner {
  constructor(private execPath: string = process.execPath) {}

  run(request: TraceRunRequest): Promise<TraceRunResult> {
    const argv = [
      ...request.nodeArgs,
      '--cpu-prof',
      `--cpu-prof-dir=${request.profileDir}`,
      request.script,
      ...request.args,
    ];

    return new Promise((resolve, reject) => {
      const proc = spawn(this.execPath, argv, {
        cwd: request.cwd,
        stdio: 'inherit',
        env: { ...process.env, NODE_V8_COVERAGE: request.coverageDir },
      });

      proc.on('close', (code, signal) => {
        resolve({ exitCode: code, signal });
      });

      proc.on('error', (err) => {
        if ('code' in err && err.code === 'ENOENT') {
          reject(new Error(`Node.js executable not found at ${this.execPath}`));
        } else {
          reject(err);
        }
      });
    });
  }
}
