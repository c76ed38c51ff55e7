import { GceInstanceManager, toProvisionedInstance } from "./gce-instance-manager";
import type { IGceOperationManager } from "./interfaces";
import { buildDiskSpec } from "../gce-spec-builder";

// ── Test helpers ───────────────────────────────────────────────────────

const DISK = buildDiskSpec(
  "zones/us-west1-a/diskTypes/pd-standard",
  20,
  true,
  "projects/ubuntu-os-cloud/global/images/ubuntu-2204-jammy-v20240101"
);

const INSTANCE = {
  name: "vm-us-west1-a",
  status: "RUNNING",
  selfLink: "https://www.googleapis.com/compute/v1/projects/test-project/zones/us-west1-a/instances/vm-us-west1-a",
  networkInterfaces: [{ accessConfigs: [{ natIP: "203.0.113.5" }] }],
};

function createManager() {
  const instancesClient = { insert: jest.fn(), get: jest.fn(), delete: jest.fn() };
  const waitForOperation = jest.fn().mockResolvedValue(undefined);
  const operationManager: IGceOperationManager = { waitForOperation };
  const log = jest.fn();
  const manager = new GceInstanceManager(instancesClient, operationManager, log);
  return { manager, instancesClient, operationManager, waitForOperation, log };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("GceInstanceManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("createInstance", () => {
    it("should insert, wait for the operation, then fetch the instance", async () => {
      const { manager, instancesClient, operationManager, log } = createManager();
      const operation = { name: "operation-1" };
      instancesClient.insert.mockResolvedValue([operation]);
      instancesClient.get.mockResolvedValue([INSTANCE]);

      const instance = await manager.createInstance("test-project", "us-west1-a", "vm-us-west1-a", [DISK], {
        externalAccess: true,
        timeoutMs: 60_000,
      });

      expect(instancesClient.insert).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-west1-a",
        instanceResource: expect.objectContaining({
          name: "vm-us-west1-a",
          disks: [DISK],
          machineType: "zones/us-west1-a/machineTypes/g2-standard-4",
        }),
      });
      expect(operationManager.waitForOperation).toHaveBeenCalledWith(
        operation,
        { project: "test-project", zone: "us-west1-a" },
        { description: "instance creation", timeoutMs: 60_000 }
      );
      expect(instancesClient.get).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-west1-a",
        instance: "vm-us-west1-a",
      });
      expect(instance).toEqual({
        name: "vm-us-west1-a",
        zone: "us-west1-a",
        status: "RUNNING",
        selfLink: INSTANCE.selfLink,
        externalIp: "203.0.113.5",
      });
      expect(log).toHaveBeenCalledWith("Creating the vm-us-west1-a instance in us-west1-a...", "stdout");
      expect(log).toHaveBeenCalledWith("Instance vm-us-west1-a created.", "stdout");
    });

    it("should default the create timeout to 300 seconds", async () => {
      const { manager, instancesClient, operationManager } = createManager();
      instancesClient.insert.mockResolvedValue([{ name: "operation-2" }]);
      instancesClient.get.mockResolvedValue([INSTANCE]);

      await manager.createInstance("test-project", "us-west1-a", "vm-us-west1-a", [DISK]);

      expect(operationManager.waitForOperation).toHaveBeenCalledWith(
        expect.anything(),
        expect.anything(),
        { description: "instance creation", timeoutMs: 300_000 }
      );
    });

    it("should not fetch the instance when the operation fails", async () => {
      const { manager, instancesClient, waitForOperation } = createManager();
      instancesClient.insert.mockResolvedValue([{ name: "operation-3" }]);
      waitForOperation.mockRejectedValue(new Error("quota exceeded"));

      await expect(
        manager.createInstance("test-project", "us-west1-a", "vm-us-west1-a", [DISK])
      ).rejects.toThrow("quota exceeded");
      expect(instancesClient.get).not.toHaveBeenCalled();
    });
  });

  describe("deleteInstance", () => {
    it("should not wait for the delete operation by default", async () => {
      const { manager, instancesClient, operationManager, log } = createManager();
      instancesClient.delete.mockResolvedValue([{ name: "operation-4" }]);

      await manager.deleteInstance("test-project", "us-west1-a", "vm-us-west1-a");

      expect(instancesClient.delete).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-west1-a",
        instance: "vm-us-west1-a",
      });
      expect(operationManager.waitForOperation).not.toHaveBeenCalled();
      expect(log).toHaveBeenCalledWith("Instance vm-us-west1-a deletion requested.", "stdout");
    });

    it("should wait for the delete operation when asked", async () => {
      const { manager, instancesClient, operationManager, log } = createManager();
      const operation = { name: "operation-5" };
      instancesClient.delete.mockResolvedValue([operation]);

      await manager.deleteInstance("test-project", "us-west1-a", "vm-us-west1-a", {
        waitForCompletion: true,
        timeoutMs: 1_000,
      });

      expect(operationManager.waitForOperation).toHaveBeenCalledWith(
        operation,
        { project: "test-project", zone: "us-west1-a" },
        { description: "instance deletion", timeoutMs: 1_000 }
      );
      expect(log).toHaveBeenCalledWith("Instance vm-us-west1-a deleted successfully.", "stdout");
    });

    it("should propagate errors from the delete request", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.delete.mockRejectedValue(new Error("NOT_FOUND"));

      await expect(
        manager.deleteInstance("test-project", "us-west1-a", "vm-us-west1-a")
      ).rejects.toThrow("NOT_FOUND");
    });
  });

  describe("toProvisionedInstance", () => {
    it("should leave externalIp unset when there is no access config", () => {
      expect(toProvisionedInstance({ name: "vm-a", status: "STAGING" }, "us-east1-c")).toEqual({
        name: "vm-a",
        zone: "us-east1-c",
        status: "STAGING",
        selfLink: "",
      });
    });
  });
});
