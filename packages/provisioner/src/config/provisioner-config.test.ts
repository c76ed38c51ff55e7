import { parseProvisionerConfig } from "./provisioner-config";
import { ConfigValidationError } from "../errors/provisioning-errors";
import { CUDA_SETUP_COMMANDS, DEFAULT_REGIONS } from "../constants";

describe("parseProvisionerConfig", () => {
  it("should fill in defaults", () => {
    const config = parseProvisionerConfig({ targetProject: "test-project" });

    expect(config).toEqual({
      sourceProject: "ubuntu-os-cloud",
      sourceFamily: "ubuntu-2204-lts",
      targetProject: "test-project",
      regions: DEFAULT_REGIONS,
      diskType: "pd-standard",
      diskSizeGb: 20,
      machineType: "g2-standard-4",
      accelerator: { type: "nvidia-l4", count: 1 },
      preemptible: false,
      spot: false,
      instanceTerminationAction: "STOP",
      deleteProtection: false,
      sshUser: "Dell",
      sshKeyPath: "id_rsa",
      sshOptions: ["StrictHostKeyChecking=no", "UserKnownHostsFile=/dev/null", "LogLevel=ERROR"],
      setupCommands: CUDA_SETUP_COMMANDS,
      cooldownSeconds: 30,
      operationTimeoutSeconds: 300,
      commandTimeoutSeconds: 900,
      waitForDeleteCompletion: false,
    });
  });

  it("should keep ten default zones in order", () => {
    const { regions } = parseProvisionerConfig({ targetProject: "test-project" });
    expect(regions).toHaveLength(10);
    expect(regions[0]).toBe("northamerica-northeast1-a");
    expect(regions[9]).toBe("us-west2-a");
  });

  it("should not share the default arrays between configs", () => {
    const first = parseProvisionerConfig({ targetProject: "test-project" });
    first.regions.push("europe-west4-a");

    const second = parseProvisionerConfig({ targetProject: "test-project" });
    expect(second.regions).toEqual(DEFAULT_REGIONS);
  });

  it("should accept a null accelerator", () => {
    const config = parseProvisionerConfig({ targetProject: "test-project", accelerator: null });
    expect(config.accelerator).toBeNull();
  });

  it("should report every invalid field", () => {
    let caught: unknown;
    try {
      parseProvisionerConfig({ regions: [], cooldownSeconds: -1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    const issues = caught instanceof ConfigValidationError ? caught.issues : [];
    expect(issues).toContain("targetProject: Required");
    expect(issues.some((issue) => issue.startsWith("regions: "))).toBe(true);
    expect(issues.some((issue) => issue.startsWith("cooldownSeconds: "))).toBe(true);
  });
});
