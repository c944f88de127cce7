/**
 * AWS Billing Manager
 *
 * Monthly cost and usage per service from Cost Explorer.
 */

import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  type GetCostAndUsageCommandInput,
  type GetCostAndUsageCommandOutput,
  type Group,
} from "@aws-sdk/client-cost-explorer";
import { assertBillingCycle, monthRange, nextMonthStart, previousDay } from "../dates.js";
import { AuthenticationError, BillingError, InvalidResponseError, ProviderError, RateLimitError } from "../errors.js";
import { noopLogger } from "../logger.js";
import { collectTokenPages } from "../pagination.js";
import { parseAmount, recordFromPayload } from "../records.js";
import { captureResult } from "../result.js";
import type { BillingLogger, BillingRecord, BillingResult, BillingSource } from "../types.js";
import { AWS_COST_METRICS, type AwsBillingManagerOptions, type AwsCredentials } from "./types.js";

const AUTH_ERROR_NAMES = new Set([
  "AccessDeniedException",
  "UnrecognizedClientException",
  "InvalidClientTokenId",
  "ExpiredTokenException",
  "InvalidSignatureException",
]);
const THROTTLE_ERROR_NAMES = new Set(["LimitExceededException", "ThrottlingException", "TooManyRequestsException"]);

type CostGroup = { period: string; estimated: boolean; group: Group };

/**
 * Map an SDK service exception by its `name` and `$metadata.httpStatusCode`.
 */
export function mapAwsError(error: unknown): BillingError {
  if (error instanceof BillingError) return error;
  if (!(error instanceof Error)) return new ProviderError(String(error), { provider: "aws" });

  const metadata = "$metadata" in error ? error.$metadata : undefined;
  const statusCode =
    typeof metadata === "object" && metadata !== null && "httpStatusCode" in metadata &&
    typeof metadata.httpStatusCode === "number"
      ? metadata.httpStatusCode
      : undefined;
  const options = { provider: "aws" as const, statusCode, details: error.name, cause: error };

  if (AUTH_ERROR_NAMES.has(error.name) || statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(`AWS rejected the credentials: ${error.message}`, options);
  }
  if (THROTTLE_ERROR_NAMES.has(error.name) || statusCode === 429) {
    return new RateLimitError(`AWS Cost Explorer is throttling requests: ${error.message}`, options);
  }
  return new ProviderError(`AWS Cost Explorer request failed: ${error.message}`, options);
}

export function costGroupToRecord({ period, estimated, group }: CostGroup): BillingRecord {
  const cost = group.Metrics?.UnblendedCost;
  const usage = group.Metrics?.UsageQuantity;
  const extensions: Record<string, string> = {};
  if (estimated) extensions.estimated = "true";

  return recordFromPayload(
    {
      provider: "aws",
      productName: group.Keys?.[0] ?? "",
      billingPeriod: period,
      usageQuantity: parseAmount(usage?.Amount),
      usageUnit: usage?.Unit && usage.Unit !== "N/A" ? usage.Unit : "",
      pretaxCost: parseAmount(cost?.Amount),
      currency: cost?.Unit ?? "USD",
      extensions,
    },
    group,
  );
}

export class AwsBillingManager implements BillingSource {
  readonly provider = "aws" as const;
  private readonly client: CostExplorerClient;
  private readonly logger: BillingLogger;

  constructor(
    credentials: AwsCredentials,
    private readonly options: AwsBillingManagerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
    this.client = new CostExplorerClient({
      region: credentials.region,
      credentials: {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
        sessionToken: credentials.sessionToken,
      },
    });
  }

  /**
   * Unblended cost and usage quantity for a month, one record per group.
   * Cost Explorer's end date is exclusive; record periods are inclusive.
   */
  async fetchBilling(billingCycle: string): Promise<BillingResult<BillingRecord[]>> {
    return captureResult(async () => {
      assertBillingCycle(billingCycle, "aws");
      const { start } = monthRange(billingCycle);
      const end = nextMonthStart(billingCycle);

      const groups = await collectTokenPages<CostGroup>(async (nextToken) => {
        const input: GetCostAndUsageCommandInput = {
          TimePeriod: { Start: start, End: end },
          Granularity: "MONTHLY",
          Metrics: [...AWS_COST_METRICS],
          GroupBy: [{ Type: "DIMENSION", Key: this.options.groupBy ?? "SERVICE" }],
          NextPageToken: nextToken,
        };

        let output: GetCostAndUsageCommandOutput;
        try {
          output = await this.client.send(new GetCostAndUsageCommand(input));
        } catch (error) {
          throw mapAwsError(error);
        }

        const items = (output.ResultsByTime ?? []).flatMap((result) => {
          const periodStart = result.TimePeriod?.Start ?? start;
          const periodEnd = previousDay(result.TimePeriod?.End ?? end);
          return (result.Groups ?? []).map((group) => ({
            period: `${periodStart}/${periodEnd}`,
            estimated: result.Estimated ?? false,
            group,
          }));
        });
        return { items, nextToken: output.NextPageToken };
      }, "aws");

      // Credit and rounding groups carry negative costs.
      const records: BillingRecord[] = [];
      for (const entry of groups) {
        try {
          records.push(costGroupToRecord(entry));
        } catch (error) {
          if (!(error instanceof InvalidResponseError)) throw error;
          this.logger.warn(`Skipping AWS cost group ${entry.group.Keys?.join("/") ?? "(no key)"}: ${error.message}`);
        }
      }

      const skipped = groups.length - records.length;
      this.logger.info(`Fetched ${groups.length} AWS cost groups for ${billingCycle} (${skipped} skipped)`);
      return records;
    }, "aws");
  }
}

export function createAwsBillingManager(
  credentials: AwsCredentials,
  options?: AwsBillingManagerOptions,
): AwsBillingManager {
  return new AwsBillingManager(credentials, options);
}
