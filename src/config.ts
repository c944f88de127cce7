/**
 * Cloud billing configuration schema (TypeBox), defaults, and resolution of
 * credentials from CLI flags with environment fallback.
 */

import { Type, type Static } from "@sinclair/typebox";
import { ValidationError } from "./errors.js";
import { assertSchema } from "./validation.js";

const NonEmpty = (description: string) => Type.String({ minLength: 1, description });

// =============================================================================
// Credentials
// =============================================================================

export const alibabaCredentialsSchema = Type.Object({
  accessKeyId: NonEmpty("Alibaba Cloud AccessKey ID"),
  accessKeySecret: NonEmpty("Alibaba Cloud AccessKey secret"),
  regionId: NonEmpty("Alibaba Cloud region ID (e.g. cn-hangzhou)"),
});

export const azureCredentialsSchema = Type.Object({
  tenantId: NonEmpty("Azure AD tenant ID"),
  clientId: NonEmpty("Azure application (client) ID"),
  clientSecret: NonEmpty("Azure client secret"),
});

export const awsCredentialsSchema = Type.Object({
  accessKeyId: NonEmpty("AWS access key ID"),
  secretAccessKey: NonEmpty("AWS secret access key"),
  sessionToken: Type.Optional(Type.String()),
  region: NonEmpty("AWS region for the Cost Explorer endpoint"),
});

export const huaweiCredentialsSchema = Type.Object({
  accessKey: NonEmpty("Huawei Cloud AK"),
  secretKey: NonEmpty("Huawei Cloud SK"),
  domainId: Type.Optional(Type.String({ description: "Huawei Cloud account (domain) ID" })),
});

export type AlibabaCredentials = Static<typeof alibabaCredentialsSchema>;
export type AzureCredentials = Static<typeof azureCredentialsSchema>;
export type AwsCredentials = Static<typeof awsCredentialsSchema>;
export type HuaweiCredentials = Static<typeof huaweiCredentialsSchema>;

// =============================================================================
// Full configuration
// =============================================================================

export const configSchema = Type.Object({
  alibaba: Type.Optional(alibabaCredentialsSchema),
  azure: Type.Optional(
    Type.Composite([azureCredentialsSchema, Type.Object({ billingAccountId: Type.Optional(Type.String()) })]),
  ),
  aws: Type.Optional(awsCredentialsSchema),
  huawei: Type.Optional(huaweiCredentialsSchema),
  kubecost: Type.Optional(
    Type.Object({
      baseUrl: Type.String({ pattern: "^https?://", description: "Kubecost base URL" }),
    }),
  ),
  polling: Type.Object({
    maxRetries: Type.Integer({ minimum: 1, description: "Status checks before giving up" }),
    intervalSeconds: Type.Number({ minimum: 0, description: "Wait between status checks" }),
  }),
  retry: Type.Object({
    maxAttempts: Type.Integer({ minimum: 1 }),
    minDelayMs: Type.Integer({ minimum: 0 }),
    maxDelayMs: Type.Integer({ minimum: 0 }),
  }),
});

export type BillingConfig = Static<typeof configSchema>;

export const DEFAULT_ALIBABA_REGION = "cn-hangzhou";
export const DEFAULT_KUBECOST_URL = "http://localhost:9090";

export function getDefaultConfig(): BillingConfig {
  return {
    polling: { maxRetries: 60, intervalSeconds: 10 },
    retry: { maxAttempts: 1, minDelayMs: 1000, maxDelayMs: 30_000 },
  };
}

// =============================================================================
// Validation
// =============================================================================

export function validateConfig(config: unknown): BillingConfig {
  return assertSchema(configSchema, config, "configuration");
}

// =============================================================================
// Flag / environment resolution
// =============================================================================

export type Env = Record<string, string | undefined>;

function pick(flag: string | undefined, env: Env, name: string): string | undefined {
  const value = flag ?? env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function resolveAlibabaCredentials(
  flags: { accessKeyId?: string; accessKeySecret?: string; regionId?: string },
  env: Env = process.env,
): AlibabaCredentials {
  const credentials = {
    accessKeyId: pick(flags.accessKeyId, env, "ALIBABA_ACCESS_KEY_ID"),
    accessKeySecret: pick(flags.accessKeySecret, env, "ALIBABA_ACCESS_KEY_SECRET"),
    regionId: pick(flags.regionId, env, "ALIBABA_REGION_ID") ?? DEFAULT_ALIBABA_REGION,
  };
  if (!credentials.accessKeyId || !credentials.accessKeySecret) {
    throw new ValidationError(
      "Missing Alibaba Cloud credentials (--access-key-id and --access-key-secret, or ALIBABA_ACCESS_KEY_ID and ALIBABA_ACCESS_KEY_SECRET)",
      { provider: "alibaba" },
    );
  }
  return assertSchema(alibabaCredentialsSchema, credentials, "Alibaba Cloud credentials", "alibaba");
}

export function resolveAzureCredentials(
  flags: { tenantId?: string; clientId?: string; clientSecret?: string },
  env: Env = process.env,
): AzureCredentials {
  const credentials = {
    tenantId: pick(flags.tenantId, env, "AZURE_TENANT_ID"),
    clientId: pick(flags.clientId, env, "AZURE_CLIENT_ID"),
    clientSecret: pick(flags.clientSecret, env, "AZURE_CLIENT_SECRET"),
  };
  if (!credentials.tenantId || !credentials.clientId || !credentials.clientSecret) {
    throw new ValidationError(
      "Missing Azure credentials (--tenant-id, --client-id, --client-secret, or AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET)",
      { provider: "azure" },
    );
  }
  return assertSchema(azureCredentialsSchema, credentials, "Azure credentials", "azure");
}

export function resolveAwsCredentials(
  flags: { accessKeyId?: string; secretAccessKey?: string; sessionToken?: string; region?: string },
  env: Env = process.env,
): AwsCredentials {
  const credentials = {
    accessKeyId: pick(flags.accessKeyId, env, "AWS_ACCESS_KEY_ID"),
    secretAccessKey: pick(flags.secretAccessKey, env, "AWS_SECRET_ACCESS_KEY"),
    sessionToken: pick(flags.sessionToken, env, "AWS_SESSION_TOKEN"),
    region: pick(flags.region, env, "AWS_REGION") ?? "us-east-1",
  };
  if (!credentials.accessKeyId || !credentials.secretAccessKey) {
    throw new ValidationError("Missing AWS credentials (AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY)", {
      provider: "aws",
    });
  }
  return assertSchema(awsCredentialsSchema, credentials, "AWS credentials", "aws");
}

export function resolveHuaweiCredentials(
  flags: { accessKey?: string; secretKey?: string; domainId?: string },
  env: Env = process.env,
): HuaweiCredentials {
  const credentials = {
    accessKey: pick(flags.accessKey, env, "HUAWEI_ACCESS_KEY"),
    secretKey: pick(flags.secretKey, env, "HUAWEI_SECRET_KEY"),
    domainId: pick(flags.domainId, env, "HUAWEI_DOMAIN_ID"),
  };
  if (!credentials.accessKey || !credentials.secretKey) {
    throw new ValidationError("Missing Huawei Cloud credentials (HUAWEI_ACCESS_KEY and HUAWEI_SECRET_KEY)", {
      provider: "huawei",
    });
  }
  return assertSchema(huaweiCredentialsSchema, credentials, "Huawei Cloud credentials", "huawei");
}

/** Merge CLI polling/retry overrides onto the defaults and validate the result. */
export function resolveRuntimeConfig(overrides: {
  maxPolls?: number;
  pollIntervalSeconds?: number;
  retries?: number;
}): BillingConfig {
  const defaults = getDefaultConfig();
  return validateConfig({
    ...defaults,
    polling: {
      maxRetries: overrides.maxPolls ?? defaults.polling.maxRetries,
      intervalSeconds: overrides.pollIntervalSeconds ?? defaults.polling.intervalSeconds,
    },
    retry: {
      ...defaults.retry,
      maxAttempts: overrides.retries ?? defaults.retry.maxAttempts,
    },
  });
}
