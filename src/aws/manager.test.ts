/**
 * AWS Billing Manager — Unit Tests
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { GetCostAndUsageCommand } from "@aws-sdk/client-cost-explorer";
import { AwsBillingManager } from "./manager.js";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-cost-explorer", () => ({
  CostExplorerClient: vi.fn().mockImplementation(function () {
    return { send: mockSend };
  }),
  GetCostAndUsageCommand: vi.fn().mockImplementation(function (input: unknown) {
    return { input };
  }),
}));

const credentials = { accessKeyId: "test-key", secretAccessKey: "test-secret", region: "us-east-1" };

function group(service: string, cost: string, usage: string, unit: string) {
  return {
    Keys: [service],
    Metrics: { UnblendedCost: { Amount: cost, Unit: "USD" }, UsageQuantity: { Amount: usage, Unit: unit } },
  };
}

describe("AwsBillingManager", () => {
  let mgr: AwsBillingManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AwsBillingManager(credentials);
  });

  it("follows NextPageToken and maps groups to records", async () => {
    mockSend
      .mockResolvedValueOnce({
        ResultsByTime: [
          {
            TimePeriod: { Start: "2024-01-01", End: "2024-02-01" },
            Estimated: false,
            Groups: [group("Amazon Elastic Compute Cloud - Compute", "12.5", "100", "Hrs")],
          },
        ],
        NextPageToken: "next-1",
      })
      .mockResolvedValueOnce({
        ResultsByTime: [
          {
            TimePeriod: { Start: "2024-01-01", End: "2024-02-01" },
            Estimated: true,
            Groups: [group("Amazon Simple Storage Service", "1.5", "20", "N/A")],
          },
        ],
      });

    const result = await mgr.fetchBilling("2024-01");

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual([
      {
        provider: "aws",
        productName: "Amazon Elastic Compute Cloud - Compute",
        resourceId: "",
        billingPeriod: "2024-01-01/2024-01-31",
        usageQuantity: 100,
        usageUnit: "Hrs",
        pretaxCost: 12.5,
        currency: "USD",
        extensions: {},
      },
      {
        provider: "aws",
        productName: "Amazon Simple Storage Service",
        resourceId: "",
        billingPeriod: "2024-01-01/2024-01-31",
        usageQuantity: 20,
        usageUnit: "",
        pretaxCost: 1.5,
        currency: "USD",
        extensions: { estimated: "true" },
      },
    ]);

    expect(mockSend).toHaveBeenCalledTimes(2);
    expect(GetCostAndUsageCommand).toHaveBeenNthCalledWith(1, {
      TimePeriod: { Start: "2024-01-01", End: "2024-02-01" },
      Granularity: "MONTHLY",
      Metrics: ["UnblendedCost", "UsageQuantity"],
      GroupBy: [{ Type: "DIMENSION", Key: "SERVICE" }],
      NextPageToken: undefined,
    });
    expect(GetCostAndUsageCommand).toHaveBeenNthCalledWith(2, expect.objectContaining({ NextPageToken: "next-1" }));
  });

  it("uses the first day of the next year for December", async () => {
    mockSend.mockResolvedValueOnce({ ResultsByTime: [] });

    await mgr.fetchBilling("2023-12");

    expect(GetCostAndUsageCommand).toHaveBeenCalledWith(
      expect.objectContaining({ TimePeriod: { Start: "2023-12-01", End: "2024-01-01" } }),
    );
  });

  it("rejects an invalid billing cycle before any request", async () => {
    const result = await mgr.fetchBilling("2024/01");

    expect(!result.success && result.error.code).toBe("VALIDATION_ERROR");
    expect(mockSend).not.toHaveBeenCalled();
  });

  it("maps throttling to a rate limit error", async () => {
    mockSend.mockRejectedValueOnce(
      Object.assign(new Error("Rate exceeded"), { name: "ThrottlingException", $metadata: { httpStatusCode: 400 } }),
    );

    const result = await mgr.fetchBilling("2024-01");

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("RATE_LIMITED");
    expect(result.error.statusCode).toBe(400);
  });

  it("maps access denied to an authentication error", async () => {
    mockSend.mockRejectedValueOnce(
      Object.assign(new Error("not authorized"), { name: "AccessDeniedException", $metadata: { httpStatusCode: 400 } }),
    );

    const result = await mgr.fetchBilling("2024-01");

    expect(!result.success && result.error.message).toBe("AWS rejected the credentials: not authorized");
  });

  it("skips a credit group with a negative cost and keeps the rest of the month", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    mgr = new AwsBillingManager(credentials, { logger });
    mockSend.mockResolvedValueOnce({
      ResultsByTime: [
        {
          TimePeriod: { Start: "2024-01-01", End: "2024-02-01" },
          Groups: [group("Tax", "-0.0000001", "0", "N/A"), group("AWS Lambda", "0.4", "1000", "Requests")],
        },
      ],
    });

    const result = await mgr.fetchBilling("2024-01");

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.map((r) => r.productName)).toEqual(["AWS Lambda"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Skipping AWS cost group Tax: aws returned an unusable line item: pretaxCost must be a non-negative number, got -1e-7",
    );
  });
});
