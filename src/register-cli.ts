/**
 * Cloud Billing — CLI Commands
 *
 * Registers `cloud-billing export` and `cloud-billing kubecost ...` on a
 * commander program. Provider clients come from injectable factories.
 */

import { writeFile } from "node:fs/promises";
import { InvalidArgumentError, type Command } from "commander";
import { createAlibabaBillingManager } from "./alibaba/index.js";
import { createAwsBillingManager } from "./aws/index.js";
import { AZURE_COST_METRICS, createAzureBillingManager, type AzureBillingManagerOptions } from "./azure/index.js";
import {
  DEFAULT_KUBECOST_URL,
  getDefaultConfig,
  resolveAlibabaCredentials,
  resolveAwsCredentials,
  resolveAzureCredentials,
  resolveHuaweiCredentials,
  resolveRuntimeConfig,
  validateConfig,
  type AlibabaCredentials,
  type AwsCredentials,
  type AzureCredentials,
  type BillingConfig,
  type Env,
  type HuaweiCredentials,
} from "./config.js";
import { writeBillingRecordsCsv } from "./csv/index.js";
import { assertBillingCycle, isIsoDate } from "./dates.js";
import { ValidationError, type BillingError } from "./errors.js";
import { createHuaweiBillingManager } from "./huawei/index.js";
import {
  createKubecostBillingManager,
  formatCostReport,
  formatResourceCosts,
  type KubecostBillingManager,
  type KubecostManagerOptions,
} from "./kubecost/index.js";
import { theme } from "./logger.js";
import { createReportPollProgress } from "./progress.js";
import { formatErrorMessage, retryBillingResult } from "./retry.js";
import { BILLING_PROVIDERS, type BillingLogger, type BillingProvider, type BillingSource } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type KubecostApi = Pick<
  KubecostBillingManager,
  | "provider"
  | "fetchBilling"
  | "getAllocationData"
  | "summarizeAllocations"
  | "namespaceCosts"
  | "workloadCosts"
  | "resourceCosts"
>;

export type BillingSourceFactories = {
  alibaba: (credentials: AlibabaCredentials, logger: BillingLogger) => BillingSource;
  azure: (credentials: AzureCredentials, options: AzureBillingManagerOptions) => BillingSource;
  aws: (credentials: AwsCredentials, logger: BillingLogger) => BillingSource;
  huawei: (credentials: HuaweiCredentials, logger: BillingLogger) => BillingSource;
  kubecost: (options: KubecostManagerOptions) => KubecostApi;
};

export type BillingCliContext = {
  program: Command;
  logger: BillingLogger;
  env?: Env;
  factories?: Partial<BillingSourceFactories>;
  /** Show a progress line while Azure generates its report (default: stderr is a TTY). */
  progress?: boolean;
  /** Receives the exit status of a failed command (default: sets process.exitCode). */
  setExitCode?: (code: number) => void;
};

type ExportOptions = {
  provider: string;
  month: string;
  output?: string;
  accessKeyId?: string;
  accessKeySecret?: string;
  regionId?: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  billingAccountId?: string;
  metric: string;
  maxPolls?: number;
  pollInterval?: number;
  retries?: number;
  baseUrl?: string;
};

type AllocationOptions = {
  baseUrl?: string;
  cluster?: string;
  start: string;
  end: string;
  step: string;
  aggregate: string;
  output?: string;
};

type ReportOptions = {
  baseUrl?: string;
  cluster?: string;
  month: string;
  by: string;
  namespace?: string;
};

export const defaultSourceFactories: BillingSourceFactories = {
  alibaba: (credentials, logger) => createAlibabaBillingManager(credentials, { logger }),
  azure: (credentials, options) => createAzureBillingManager(credentials, options),
  aws: (credentials, logger) => createAwsBillingManager(credentials, { logger }),
  huawei: (credentials, logger) => createHuaweiBillingManager(credentials, { logger }),
  kubecost: (options) => createKubecostBillingManager(options),
};

// =============================================================================
// Helpers
// =============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative number.");
  }
  return parsed;
}

function parseProvider(value: string): BillingProvider {
  const provider = BILLING_PROVIDERS.find((p) => p === value);
  if (!provider) throw new ValidationError(`Unknown provider: ${value}. Expected one of ${BILLING_PROVIDERS.join(", ")}`);
  return provider;
}

function parseMetric(value: string) {
  const metric = AZURE_COST_METRICS.find((m) => m === value);
  if (!metric) throw new ValidationError(`Unknown Azure metric: ${value}. Expected one of ${AZURE_COST_METRICS.join(", ")}`);
  return metric;
}

/** `YYYY-MM-DD` is midnight UTC; anything else must be a full timestamp. */
export function parseWindowTime(value: string, field: string): Date {
  const parsed = isIsoDate(value) ? new Date(`${value}T00:00:00Z`) : new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid ${field}: ${value}, expected YYYY-MM-DD or an ISO 8601 timestamp`, {
      provider: "kubecost",
    });
  }
  return parsed;
}

// =============================================================================
// CLI Registration
// =============================================================================

export function registerBillingCli(ctx: BillingCliContext): void {
  const env = ctx.env ?? process.env;
  const factories: BillingSourceFactories = { ...defaultSourceFactories, ...ctx.factories };
  const setExitCode =
    ctx.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const { logger } = ctx;

  async function guarded(action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.error(theme.error(formatErrorMessage(error)));
      setExitCode(1);
    }
  }

  function kubecostFor(options: { baseUrl?: string; cluster?: string }): KubecostApi {
    const kubecost = { baseUrl: options.baseUrl ?? env.KUBECOST_BASE_URL ?? DEFAULT_KUBECOST_URL };
    validateConfig({ ...getDefaultConfig(), kubecost });
    const clusterName = options.cluster ?? env.KUBECOST_CLUSTER_NAME;
    return factories.kubecost({ ...kubecost, ...(clusterName ? { clusterName } : {}), logger });
  }

  function sourceFor(
    provider: BillingProvider,
    options: ExportOptions,
    config: BillingConfig,
  ): { source: BillingSource; done?: () => void } {
    switch (provider) {
      case "alibaba":
        return { source: factories.alibaba(resolveAlibabaCredentials(options, env), logger) };
      case "aws":
        return { source: factories.aws(resolveAwsCredentials({}, env), logger) };
      case "huawei":
        return { source: factories.huawei(resolveHuaweiCredentials({}, env), logger) };
      case "kubecost":
        return { source: kubecostFor(options) };
      case "azure": {
        const billingAccountId = options.billingAccountId ?? env.AZURE_BILLING_ACCOUNT_ID;
        if (!billingAccountId) {
          throw new ValidationError("Missing Azure billing account ID (--billing-account-id or AZURE_BILLING_ACCOUNT_ID)", {
            provider: "azure",
          });
        }
        const credentials = resolveAzureCredentials(options, env);
        const metric = parseMetric(options.metric);
        const progress = createReportPollProgress(
          "Azure",
          config.polling.maxRetries,
          !(ctx.progress ?? Boolean(process.stderr.isTTY)),
        );
        const source = factories.azure(credentials, {
          billingAccountId,
          metric,
          maxRetries: config.polling.maxRetries,
          intervalSeconds: config.polling.intervalSeconds,
          logger,
          onPoll: (state) => progress.update(state),
        });
        return { source, done: () => progress.done() };
      }
    }
  }

  // ---------------------------------------------------------------------------
  // export
  // ---------------------------------------------------------------------------
  ctx.program
    .command("export")
    .description("Download a month of billing records to CSV")
    .requiredOption("--provider <provider>", `Billing provider (${BILLING_PROVIDERS.join(", ")})`)
    .requiredOption("--month <YYYY-MM>", "Billing cycle")
    .option("--output <path>", "CSV file to write (default: {provider}_billing_{month}.csv)")
    .option("--access-key-id <id>", "Alibaba Cloud AccessKey ID")
    .option("--access-key-secret <secret>", "Alibaba Cloud AccessKey secret")
    .option("--region-id <region>", "Alibaba Cloud region ID")
    .option("--tenant-id <id>", "Azure AD tenant ID")
    .option("--client-id <id>", "Azure application (client) ID")
    .option("--client-secret <secret>", "Azure client secret")
    .option("--billing-account-id <id>", "Azure billing account ID")
    .option("--metric <metric>", `Azure cost metric (${AZURE_COST_METRICS.join(", ")})`, "ActualCost")
    .option("--max-polls <n>", "Azure report status checks before giving up", parsePositiveInt)
    .option("--poll-interval <seconds>", "Seconds between Azure status checks", parseNonNegativeNumber)
    .option("--retries <n>", "Attempts for throttled or failed requests", parsePositiveInt)
    .option("--base-url <url>", "Kubecost base URL")
    .action(async (options: ExportOptions) =>
      guarded(async () => {
        const provider = parseProvider(options.provider);
        assertBillingCycle(options.month, provider);
        const config = resolveRuntimeConfig({
          maxPolls: options.maxPolls,
          pollIntervalSeconds: options.pollInterval,
          retries: options.retries,
        });

        const { source, done } = sourceFor(provider, options, config);
        logger.info(`Fetching ${provider} billing for ${options.month}`);
        const result = await retryBillingResult(() => source.fetchBilling(options.month), config.retry, {
          onRetry: (attempt, error, delayMs) =>
            logger.warn(`Attempt ${attempt} failed (${error.message}); retrying in ${Math.round(delayMs)}ms`),
        });
        done?.();
        if (!result.success) throw result.error;

        const output = options.output ?? `${provider}_billing_${options.month}.csv`;
        const count = await writeBillingRecordsCsv(output, result.data);
        console.log(theme.success(`Exported ${count} ${provider} records to ${output}`));
      }),
    );

  // ---------------------------------------------------------------------------
  // kubecost
  // ---------------------------------------------------------------------------
  const kubecost = ctx.program.command("kubecost").description("Kubecost allocation queries");

  kubecost
    .command("allocation")
    .description("Print allocations for a window as JSON lines")
    .option("--base-url <url>", "Kubecost base URL (default: KUBECOST_BASE_URL or http://localhost:9090)")
    .option("--cluster <name>", "Only this cluster (default: KUBECOST_CLUSTER_NAME)")
    .requiredOption("--start <time>", "Window start (YYYY-MM-DD or ISO 8601)")
    .requiredOption("--end <time>", "Window end (YYYY-MM-DD or ISO 8601)")
    .option("--step <step>", "Allocation step", "1d")
    .option("--aggregate <fields>", "Comma-separated aggregation", "cluster,namespace")
    .option("--output <path>", "JSON lines file to write instead of stdout")
    .action(async (options: AllocationOptions) =>
      guarded(async () => {
        const start = parseWindowTime(options.start, "start");
        const end = parseWindowTime(options.end, "end");
        const client = kubecostFor(options);

        const lines: string[] = [];
        const failures: BillingError[] = [];
        for await (const result of client.getAllocationData(start, end, {
          step: options.step,
          aggregate: options.aggregate.split(",").map((field) => field.trim()).filter(Boolean),
        })) {
          if (result.success) lines.push(JSON.stringify(result.data));
          else failures.push(result.error);
        }
        if (lines.length === 0 && failures.length > 0) throw failures[0];
        for (const error of failures) logger.warn(`Skipping allocation: ${error.message}`);

        if (options.output) {
          await writeFile(options.output, lines.map((line) => `${line}\n`).join(""), "utf8");
          console.log(theme.success(`Wrote ${lines.length} allocations to ${options.output}`));
        } else {
          for (const line of lines) console.log(line);
        }
      }),
    );

  kubecost
    .command("report")
    .description("Print a month's cost summary or breakdown")
    .option("--base-url <url>", "Kubecost base URL (default: KUBECOST_BASE_URL or http://localhost:9090)")
    .requiredOption("--month <YYYY-MM>", "Billing cycle")
    .option("--cluster <name>", "Only this cluster (default: KUBECOST_CLUSTER_NAME)")
    .option("--by <dimension>", "summary, namespace, workload or resources", "summary")
    .option("--namespace <name>", "Limit a workload breakdown to one namespace")
    .action(async (options: ReportOptions) =>
      guarded(async () => {
        const client = kubecostFor(options);
        switch (options.by) {
          case "summary": {
            const result = await client.summarizeAllocations(options.month);
            if (!result.success) throw result.error;
            console.log(formatCostReport(result.data));
            return;
          }
          case "namespace": {
            const result = await client.namespaceCosts(options.month);
            if (!result.success) throw result.error;
            console.log(formatCostReport(result.data));
            return;
          }
          case "workload": {
            const result = await client.workloadCosts(options.month, options.namespace);
            if (!result.success) throw result.error;
            console.log(formatCostReport(result.data));
            return;
          }
          case "resources": {
            const result = await client.resourceCosts(options.month);
            if (!result.success) throw result.error;
            console.log(formatResourceCosts(result.data));
            return;
          }
          default:
            throw new ValidationError(
              `Unknown breakdown: ${options.by}. Expected summary, namespace, workload or resources`,
              { provider: "kubecost" },
            );
        }
      }),
    );
}
