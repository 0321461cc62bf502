export type ModuleStatus = 'passed' | 'failed';

export interface ModuleOutcome {
  moduleId: string;
  status: ModuleStatus;
  logPath: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  error?: string;
  durationMs: number;
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  failedModules: string[];
  outcomes: ModuleOutcome[];
  durationMs: number;
  logDir: string;
}

export interface StreamChunk {
  type: 'stdout' | 'stderr';
  /** Raw bytes as read from the pipe; may end inside a multi-byte character. */
  data: Buffer;
}

export interface ContainerConfig {
  image: string;
  workDir: string;
}

export interface OrchestratorConfig {
  modules: string[];
  command: string;
  args: string[];
  threads: number;
  maxConcurrent: number;
  logDir: string;
  logPrefix: string;
  cwd: string;
  env: Record<string, string>;
  container?: ContainerConfig;
}

export interface JsonReport {
  totalModules: number;
  passed: number;
  failed: number;
  failedModules: string[];
  durationMs: number;
  logDir: string;
  results: ModuleOutcome[];
}
