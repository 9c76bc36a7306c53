export const STEP_NAMES = [
  "VirtualizationReady",
  "RuntimeInstalled",
  "RuntimeRunning",
  "WorkspaceReady",
  "ConfigWritten",
  "ImagesPulled",
  "Deployed",
] as const;

export type StepName = typeof STEP_NAMES[number];

export type StepOutcome =
  | "not_attempted" // Step never dispatched in this run
  | "succeeded"
  | "failed";       // Includes steps the operator skipped

export type ErrorKind =
  | "PrerequisiteUnmet"
  | "ProbeTimeout"
  | "InstallFailed"
  | "RestartRequired"
  | "UserDeclined"
  | "DirectoryCreateFailed"
  | "ConfigWriteFailed"
  | "PullFailed"
  | "LaunchFailed"
  | "StatusVerificationFailed";

export interface StepResult {
  outcome: "succeeded" | "failed" | "skipped";
  reason?: string;
  error?: ErrorKind;
  // Only meaningful on PullFailed: the failure was accepted and the run goes on
  advisory?: boolean;
  logTail?: string;
}

export type RestartPolicy = "no" | "unless-stopped";
export type LaunchMode = "direct" | "compose";
export type PullFailurePolicy = "prompt" | "continue" | "abort";

export interface ImageRef {
  repository: string;
  tag: string;
}

export interface PollSettings {
  runtimeIntervalMs: number;
  runtimeAttempts: number;
  launchIntervalMs: number;
  launchAttempts: number;
  probeTimeoutMs: number;
}

export interface DeploymentConfig {
  containerName: string;
  serviceName: string;
  projectName: string;
  appImage: ImageRef;
  runtimeImage: ImageRef;
  workspaceDir: string; // Host path, mounted at /opt/workspace_base
  stateDir: string;     // Host path, mounted at /.openhands-state
  hostPort: number;
  containerPort: number;
  sandboxUserId: string;
  logAllEvents: boolean;
  restart: RestartPolicy;
  env: Record<string, string>;
  launch: LaunchMode;
  pullFailure: PullFailurePolicy;
  composeFile: string;
  dockerArgs: string[];
  poll: PollSettings;
}

export interface ContainerSummary {
  name: string;
  status: string;
}

export interface BlockedStep {
  step: StepName;
  missing: StepName[];
}

export interface RunReport {
  state: Record<StepName, StepOutcome>;
  executed: { step: StepName; result: StepResult }[];
  abortedAt: StepName | null;
  blocked: BlockedStep[];
  url: string | null;
}
