import * as childProcess from "child_process";
import { SshCommandRunner, buildSshArgs } from "./ssh-command-runner";

// Mock child_process.execFile so no ssh process is started
jest.mock("child_process", () => ({
  execFile: jest.fn(),
}));

const mockExecFile = childProcess.execFile as unknown as jest.Mock;

type ExecError = Error & { code?: unknown; killed?: boolean; signal?: string | null };

type ExecCallback = (error: ExecError | null, stdout: string, stderr: string) => void;

/**
 * Make execFile call back with the given outcome.
 */
function setupExecFile(error: ExecError | null, stdout = "", stderr = "") {
  mockExecFile.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
    cb(error, stdout, stderr);
    return undefined;
  });
}

const REQUEST = {
  host: "203.0.113.5",
  user: "Dell",
  keyFile: "id_rsa",
  command: "nvidia-smi",
};

describe("buildSshArgs", () => {
  it("should pass key, options, target and command", () => {
    expect(buildSshArgs(REQUEST, ["StrictHostKeyChecking=no", "ConnectTimeout=10"])).toEqual([
      "-n",
      "-i",
      "id_rsa",
      "-o",
      "StrictHostKeyChecking=no",
      "-o",
      "ConnectTimeout=10",
      "Dell@203.0.113.5",
      "nvidia-smi",
    ]);
  });

  it("should keep a quoted command as a single argument", () => {
    expect(buildSshArgs({ ...REQUEST, command: "echo 'works'" })).toEqual([
      "-n",
      "-i",
      "id_rsa",
      "Dell@203.0.113.5",
      "echo 'works'",
    ]);
  });
});

describe("SshCommandRunner", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should run ssh with the request timeout", async () => {
    setupExecFile(null, "NVIDIA-SMI 535.104.05\n");
    const runner = new SshCommandRunner({ sshOptions: ["BatchMode=yes"] });

    const result = await runner.runRemoteCommand({ ...REQUEST, timeoutMs: 5_000 });

    expect(result).toEqual({
      exitCode: 0,
      stdout: "NVIDIA-SMI 535.104.05\n",
      stderr: "",
      timedOut: false,
    });
    expect(mockExecFile).toHaveBeenCalledWith(
      "ssh",
      ["-n", "-i", "id_rsa", "-o", "BatchMode=yes", "Dell@203.0.113.5", "nvidia-smi"],
      expect.objectContaining({ timeout: 5_000 }),
      expect.any(Function)
    );
  });

  it("should resolve with the exit code of a failed command", async () => {
    setupExecFile(Object.assign(new Error("Command failed"), { code: 100 }), "", "E: Unable to locate package");
    const runner = new SshCommandRunner();

    await expect(runner.runRemoteCommand(REQUEST)).resolves.toEqual({
      exitCode: 100,
      stdout: "",
      stderr: "E: Unable to locate package",
      timedOut: false,
    });
  });

  it("should report a killed command as timed out", async () => {
    setupExecFile(Object.assign(new Error("Command failed"), { killed: true, code: null }));
    const runner = new SshCommandRunner();

    const result = await runner.runRemoteCommand(REQUEST);

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it("should resolve when ssh is ended by an outside signal", async () => {
    setupExecFile(
      Object.assign(new Error("Command failed"), { code: null, killed: false, signal: "SIGHUP" }),
      "partial output\n"
    );
    const runner = new SshCommandRunner();

    await expect(runner.runRemoteCommand(REQUEST)).resolves.toEqual({
      exitCode: null,
      signal: "SIGHUP",
      stdout: "partial output\n",
      stderr: "",
      timedOut: false,
    });
  });

  it("should resolve when the output overflows the buffer", async () => {
    setupExecFile(
      Object.assign(new Error("stdout maxBuffer length exceeded"), {
        code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER",
        killed: true,
        signal: "SIGTERM",
      })
    );
    const runner = new SshCommandRunner();

    const result = await runner.runRemoteCommand(REQUEST);

    expect(result.timedOut).toBe(false);
    expect(result.exitCode).toBeNull();
  });

  it("should reject when ssh cannot be started", async () => {
    setupExecFile(Object.assign(new Error("spawn ssh ENOENT"), { code: "ENOENT" }));
    const runner = new SshCommandRunner();

    await expect(runner.runRemoteCommand(REQUEST)).rejects.toThrow("Failed to run ssh: spawn ssh ENOENT");
  });
});
