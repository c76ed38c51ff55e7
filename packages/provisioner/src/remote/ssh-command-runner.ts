/**
 * SSH Command Runner
 *
 * Runs one command on a remote host through the system `ssh` binary.
 * A non-zero exit, a signal or a timeout is reported in the result, never
 * thrown: the setup sequence keeps going whatever a single step returns.
 * Only a failure to start ssh rejects.
 */

import { execFile } from "child_process";
import { REMOTE_COMMAND_TIMEOUT_MS } from "../constants";

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

// errno codes meaning the ssh binary itself could not be started
const SPAWN_ERROR_CODES: ReadonlySet<string> = new Set([
  "ENOENT",
  "EACCES",
  "EPERM",
  "EAGAIN",
  "EMFILE",
  "ENFILE",
  "ENOMEM",
]);

const MAX_BUFFER_ERROR_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

export interface RemoteCommandRequest {
  /** Host name or IP address */
  host: string;
  user: string;
  /** Private key file passed to `ssh -i` */
  keyFile: string;
  /** Literal command line run by the remote shell */
  command: string;
  /** Kill ssh after this many milliseconds. Default: 15 minutes */
  timeoutMs?: number;
}

export interface RemoteCommandResult {
  /** Exit status of ssh (255 for connection errors); null when it did not exit normally */
  exitCode: number | null;
  /** Signal that ended ssh, when one did */
  signal?: string;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Synchronous-per-call remote command execution.
 */
export interface IRemoteCommandRunner {
  runRemoteCommand(request: RemoteCommandRequest): Promise<RemoteCommandResult>;
}

export interface SshCommandRunnerOptions {
  /** Extra `-o` options, e.g. "StrictHostKeyChecking=no" */
  sshOptions?: string[];
  /** ssh binary. Default: "ssh" */
  sshBinary?: string;
}

/**
 * Build the argument vector for `ssh`. `-n` detaches stdin so a remote
 * prompt sees end-of-file instead of waiting for input.
 */
export function buildSshArgs(request: RemoteCommandRequest, sshOptions: string[] = []): string[] {
  return [
    "-n",
    "-i",
    request.keyFile,
    ...sshOptions.flatMap((option) => ["-o", option]),
    `${request.user}@${request.host}`,
    request.command,
  ];
}

export class SshCommandRunner implements IRemoteCommandRunner {
  private readonly sshOptions: string[];
  private readonly sshBinary: string;

  constructor(options: SshCommandRunnerOptions = {}) {
    this.sshOptions = options.sshOptions ?? [];
    this.sshBinary = options.sshBinary ?? "ssh";
  }

  runRemoteCommand(request: RemoteCommandRequest): Promise<RemoteCommandResult> {
    const args = buildSshArgs(request, this.sshOptions);
    const timeoutMs = request.timeoutMs ?? REMOTE_COMMAND_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      execFile(
        this.sshBinary,
        args,
        { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES },
        (error, stdout, stderr) => {
          const out = String(stdout);
          const err = String(stderr);

          if (!error) {
            resolve({ exitCode: 0, stdout: out, stderr: err, timedOut: false });
            return;
          }

          const code: unknown = error.code;
          if (typeof code === "string" && SPAWN_ERROR_CODES.has(code)) {
            reject(new Error(`Failed to run ${this.sshBinary}: ${error.message}`));
            return;
          }
          // node also sets `killed` when it stops ssh for overflowing maxBuffer
          if (error.killed && code !== MAX_BUFFER_ERROR_CODE) {
            resolve({ exitCode: null, stdout: out, stderr: err, timedOut: true });
            return;
          }
          if (typeof code === "number") {
            resolve({ exitCode: code, stdout: out, stderr: err, timedOut: false });
            return;
          }

          const result: RemoteCommandResult = { exitCode: null, stdout: out, stderr: err, timedOut: false };
          if (error.signal) {
            result.signal = error.signal;
          }
          resolve(result);
        }
      );
    });
  }
}
