/**
 * Tests for the cloud-billing CLI commands.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock, type MockInstance } from "vitest";
import { ProviderError } from "./errors.js";
import { fail, ok } from "./result.js";
import { createBillingRecord } from "./records.js";
import { parseWindowTime, registerBillingCli, type BillingSourceFactories, type KubecostApi } from "./register-cli.js";
import type { AzureBillingManagerOptions } from "./azure/index.js";
import type { KubecostAllocation } from "./kubecost/index.js";
import type { BillingResult } from "./types.js";

const ENV = {
  ALIBABA_ACCESS_KEY_ID: "test-key-id",
  ALIBABA_ACCESS_KEY_SECRET: "test-secret",
  AZURE_TENANT_ID: "tenant-1",
  AZURE_CLIENT_ID: "client-1",
  AZURE_CLIENT_SECRET: "test-secret",
};

const RECORD = createBillingRecord({
  provider: "alibaba",
  productName: "ECS",
  resourceId: "i-001",
  billingPeriod: "2024-01",
  usageQuantity: 2,
  usageUnit: "Hour",
  pretaxCost: 12.5,
  currency: "CNY",
});

function allocation(namespace: string): KubecostAllocation {
  return {
    clusterId: "c1",
    clusterName: "c1",
    namespace,
    workloadName: null,
    workloadType: null,
    containerName: null,
    startDate: "2024-03-01T00:00:00Z",
    endDate: "2024-03-02T00:00:00Z",
    windowStart: "2024-03-01T00:00:00Z",
    windowEnd: "2024-03-02T00:00:00Z",
    cpuCoresAllocated: null,
    cpuCoresUsed: null,
    memoryGbAllocated: null,
    memoryGbUsed: null,
    storageGbAllocated: null,
    totalCost: 1,
    cpuCost: null,
    memoryCost: null,
    storageCost: null,
    networkCost: null,
    labels: {},
    annotations: {},
    cloudProvider: "unknown",
    region: null,
  };
}

function costs(cpuCost: number, memoryCost: number, networkCost: number, totalCost: number) {
  return { cpuCost, memoryCost, storageCost: 0, networkCost, totalCost };
}

function fakeKubecost(results: BillingResult<KubecostAllocation>[]): KubecostApi {
  return {
    provider: "kubecost",
    fetchBilling: vi.fn(async () => ok([])),
    getAllocationData: vi.fn(async function* () {
      yield* results;
    }),
    summarizeAllocations: vi.fn(async () =>
      ok({ cpuCost: 1, memoryCost: 2, storageCost: 0, networkCost: 0, totalCost: 3 }),
    ),
    namespaceCosts: vi.fn(async () => ok([])),
    workloadCosts: vi.fn(async () => ok([])),
    resourceCosts: vi.fn(async () =>
      ok({
        ecsCost: 4,
        rdsCost: 0,
        slbCost: 1,
        totalCost: 5,
        resources: [
          { name: "prod", instanceType: "ecs.g6.large", nodeType: "worker", ...costs(3, 1, 0, 4) },
          { name: "edge", instanceType: "slb.s1.small", nodeType: "", ...costs(0, 0, 1, 1) },
        ],
      }),
    ),
  };
}

describe("registerBillingCli", () => {
  let program: Command;
  let dir: string;
  let setExitCode: Mock<(code: number) => void>;
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  let log: MockInstance<typeof console.log>;
  let errorOutput: MockInstance<typeof console.error>;

  function register(factories: Partial<BillingSourceFactories>) {
    program = new Command();
    program.exitOverride();
    registerBillingCli({ program, logger, env: ENV, factories, progress: false, setExitCode });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cloud-billing-cli-"));
    setExitCode = vi.fn<(code: number) => void>();
    vi.clearAllMocks();
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    errorOutput = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("registers export and kubecost commands", () => {
    register({});
    expect(program.commands.map((c) => c.name())).toEqual(["export", "kubecost"]);
    const kubecost = program.commands.find((c) => c.name() === "kubecost");
    expect(kubecost?.commands.map((c) => c.name())).toEqual(["allocation", "report"]);
  });

  describe("export", () => {
    it("writes Alibaba records to CSV", async () => {
      const alibaba = vi.fn<BillingSourceFactories["alibaba"]>(() => ({
        provider: "alibaba",
        fetchBilling: vi.fn(async () => ok([RECORD])),
      }));
      register({ alibaba });
      const output = join(dir, "out.csv");

      await program.parseAsync(["export", "--provider", "alibaba", "--month", "2024-01", "--output", output], {
        from: "user",
      });

      expect(alibaba).toHaveBeenCalledWith(
        { accessKeyId: "test-key-id", accessKeySecret: "test-secret", regionId: "cn-hangzhou" },
        logger,
      );
      expect(await readFile(output, "utf8")).toBe(
        "provider,productName,resourceId,billingPeriod,usageQuantity,usageUnit,pretaxCost,currency,extensions\n" +
          "alibaba,ECS,i-001,2024-01,2,Hour,12.5,CNY,\n",
      );
      expect(setExitCode).not.toHaveBeenCalled();
    });

    it("passes polling settings to the Azure client", async () => {
      let received: AzureBillingManagerOptions | undefined;
      register({
        azure: (_credentials, options) => {
          received = options;
          return { provider: "azure", fetchBilling: async () => ok([]) };
        },
      });

      await program.parseAsync(
        [
          "export",
          "--provider",
          "azure",
          "--month",
          "2024-02",
          "--billing-account-id",
          "acct-1",
          "--max-polls",
          "5",
          "--poll-interval",
          "2",
          "--output",
          join(dir, "azure.csv"),
        ],
        { from: "user" },
      );

      expect(received?.billingAccountId).toBe("acct-1");
      expect(received?.metric).toBe("ActualCost");
      expect(received?.maxRetries).toBe(5);
      expect(received?.intervalSeconds).toBe(2);
      expect(log).toHaveBeenCalledWith(expect.stringContaining(`Exported 0 azure records to ${join(dir, "azure.csv")}`));
    });

    it("draws one progress line per Azure status check", async () => {
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      program = new Command();
      program.exitOverride();
      registerBillingCli({
        program,
        logger,
        env: ENV,
        progress: true,
        setExitCode,
        factories: {
          azure: (_credentials, options) => ({
            provider: "azure",
            fetchBilling: async () => {
              options.onPoll?.({ operationUrl: "https://op.test/1", attempts: 1, status: "running" });
              options.onPoll?.({ operationUrl: "https://op.test/1", attempts: 2, status: "succeeded" });
              return ok([]);
            },
          }),
        },
      });

      await program.parseAsync(
        ["export", "--provider", "azure", "--month", "2024-02", "--billing-account-id", "acct-1", "--output", join(dir, "a.csv")],
        { from: "user" },
      );

      expect(write.mock.calls.map((c) => c[0])).toEqual([
        "\r  Waiting for Azure cost report: check 1/60 (running)",
        "\r  Waiting for Azure cost report: check 2/60 (succeeded)",
        "\n",
      ]);
    });

    it("reports missing Azure credentials before drawing progress", async () => {
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      program = new Command();
      program.exitOverride();
      registerBillingCli({ program, logger, env: {}, factories: {}, progress: true, setExitCode });

      await program.parseAsync(["export", "--provider", "azure", "--month", "2024-02", "--billing-account-id", "acct-1"], {
        from: "user",
      });

      expect(setExitCode).toHaveBeenCalledWith(1);
      expect(errorOutput).toHaveBeenCalledWith(expect.stringContaining("Missing Azure credentials"));
      expect(write).not.toHaveBeenCalled();
    });

    it("fails without an Azure billing account", async () => {
      register({});

      await program.parseAsync(["export", "--provider", "azure", "--month", "2024-02"], { from: "user" });

      expect(setExitCode).toHaveBeenCalledWith(1);
      expect(errorOutput).toHaveBeenCalledWith(
        expect.stringContaining("Missing Azure billing account ID (--billing-account-id or AZURE_BILLING_ACCOUNT_ID)"),
      );
    });

    it("rejects a malformed month before building a client", async () => {
      const alibaba = vi.fn<BillingSourceFactories["alibaba"]>();
      register({ alibaba });

      await program.parseAsync(["export", "--provider", "alibaba", "--month", "2024-13"], { from: "user" });

      expect(alibaba).not.toHaveBeenCalled();
      expect(setExitCode).toHaveBeenCalledWith(1);
      expect(errorOutput).toHaveBeenCalledWith(
        expect.stringContaining("Invalid billing cycle format: 2024-13, expected YYYY-MM"),
      );
    });

    it("reports a provider failure on stderr", async () => {
      register({
        alibaba: () => ({
          provider: "alibaba",
          fetchBilling: async () => fail(new ProviderError("Alibaba Cloud QueryInstanceBill failed: busy")),
        }),
      });

      await program.parseAsync(["export", "--provider", "alibaba", "--month", "2024-01", "--output", join(dir, "x.csv")], {
        from: "user",
      });

      expect(setExitCode).toHaveBeenCalledWith(1);
      expect(errorOutput).toHaveBeenCalledWith(
        expect.stringContaining("[PROVIDER_ERROR] Alibaba Cloud QueryInstanceBill failed: busy"),
      );
    });
  });

  describe("kubecost", () => {
    it("prints allocations as JSON lines", async () => {
      const client = fakeKubecost([ok(allocation("payments")), ok(allocation("web"))]);
      const kubecost = vi.fn<BillingSourceFactories["kubecost"]>(() => client);
      register({ kubecost });

      await program.parseAsync(
        ["kubecost", "allocation", "--base-url", "http://kc.test", "--start", "2024-03-01", "--end", "2024-03-02"],
        { from: "user" },
      );

      expect(kubecost).toHaveBeenCalledWith({ baseUrl: "http://kc.test", logger });
      expect(client.getAllocationData).toHaveBeenCalledWith(
        new Date("2024-03-01T00:00:00Z"),
        new Date("2024-03-02T00:00:00Z"),
        { step: "1d", aggregate: ["cluster", "namespace"] },
      );
      expect(log.mock.calls.map((c) => JSON.parse(String(c[0])).namespace)).toEqual(["payments", "web"]);
    });

    it("writes allocations to a file and warns about unusable ones", async () => {
      const client = fakeKubecost([
        ok(allocation("payments")),
        fail(new ProviderError("Invalid allocation c/x: /totalCost: Expected number")),
      ]);
      register({ kubecost: () => client });
      const output = join(dir, "alloc.jsonl");

      await program.parseAsync(
        ["kubecost", "allocation", "--start", "2024-03-01", "--end", "2024-03-02", "--output", output],
        { from: "user" },
      );

      const lines = (await readFile(output, "utf8")).split("\n");
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[0]).namespace).toBe("payments");
      expect(lines[1]).toBe("");
      expect(logger.warn).toHaveBeenCalledWith("Skipping allocation: Invalid allocation c/x: /totalCost: Expected number");
    });

    it("fails when nothing could be read", async () => {
      register({ kubecost: () => fakeKubecost([fail(new ProviderError("kubecost request failed: HTTP 502"))]) });

      await program.parseAsync(["kubecost", "allocation", "--start", "2024-03-01", "--end", "2024-03-02"], {
        from: "user",
      });

      expect(setExitCode).toHaveBeenCalledWith(1);
      expect(log).not.toHaveBeenCalled();
    });

    it("rejects a base URL without an http scheme", async () => {
      const kubecost = vi.fn<BillingSourceFactories["kubecost"]>(() => fakeKubecost([]));
      register({ kubecost });

      await program.parseAsync(
        ["kubecost", "allocation", "--base-url", "kc.test", "--start", "2024-03-01", "--end", "2024-03-02"],
        { from: "user" },
      );

      expect(kubecost).not.toHaveBeenCalled();
      expect(setExitCode).toHaveBeenCalledWith(1);
      expect(errorOutput).toHaveBeenCalledWith(expect.stringContaining("[VALIDATION_ERROR] Invalid configuration:"));
    });

    it("scopes the client to a cluster", async () => {
      const kubecost = vi.fn<BillingSourceFactories["kubecost"]>(() => fakeKubecost([]));
      register({ kubecost });

      await program.parseAsync(["kubecost", "report", "--month", "2024-03", "--cluster", "prod"], { from: "user" });

      expect(kubecost).toHaveBeenCalledWith({ baseUrl: "http://localhost:9090", clusterName: "prod", logger });
    });

    it("prints the ECS, RDS and SLB breakdown", async () => {
      register({ kubecost: () => fakeKubecost([]) });

      await program.parseAsync(["kubecost", "report", "--month", "2024-03", "--by", "resources"], { from: "user" });

      expect(log).toHaveBeenCalledWith(
        "ECS Cost: $4.00\nRDS Cost: $0.00\nSLB Cost: $1.00\nTotal Cost: $5.00\n" +
          "Cost Breakdown:\n 1. prod: $4.00\n 2. edge: $1.00\n",
      );
    });

    it("prints a monthly summary", async () => {
      register({ kubecost: () => fakeKubecost([]) });

      await program.parseAsync(["kubecost", "report", "--month", "2024-03"], { from: "user" });

      expect(log).toHaveBeenCalledWith(
        "Total Cost: $3.00\nCPU Cost: $1.00\nMemory Cost: $2.00\nStorage Cost: $0.00\nNetwork Cost: $0.00",
      );
    });
  });
});

describe("parseWindowTime", () => {
  it("reads dates as UTC midnight and keeps full timestamps", () => {
    expect(parseWindowTime("2024-03-01", "start").toISOString()).toBe("2024-03-01T00:00:00.000Z");
    expect(parseWindowTime("2024-03-01T06:30:00Z", "start").toISOString()).toBe("2024-03-01T06:30:00.000Z");
  });

  it("rejects unparseable input", () => {
    expect(() => parseWindowTime("yesterday", "end")).toThrow("Invalid end: yesterday");
  });
});
