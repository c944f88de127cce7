/**
 * Azure — Credentials Manager
 *
 * Service principal authentication through @azure/identity. The credential
 * object is built once and reused; it caches access tokens itself.
 */

import type { TokenCredential } from "@azure/identity";
import { AuthenticationError } from "../errors.js";
import { AZURE_MANAGEMENT_SCOPE, type AzureCredentials, type AzureTokenProvider } from "./types.js";

export class AzureCredentialsManager implements AzureTokenProvider {
  private credential: TokenCredential | null = null;

  constructor(
    private readonly credentials: AzureCredentials,
    private readonly scope: string = AZURE_MANAGEMENT_SCOPE,
  ) {}

  async getCredential(): Promise<TokenCredential> {
    if (this.credential) return this.credential;
    const identity = await import("@azure/identity");
    this.credential = new identity.ClientSecretCredential(
      this.credentials.tenantId,
      this.credentials.clientId,
      this.credentials.clientSecret,
    );
    return this.credential;
  }

  /**
   * Acquire a bearer token for Azure Resource Manager. Any rejection by the
   * identity platform surfaces as an AuthenticationError.
   */
  async getAccessToken(): Promise<string> {
    const credential = await this.getCredential();
    let token: Awaited<ReturnType<TokenCredential["getToken"]>>;
    try {
      token = await credential.getToken(this.scope);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(`Azure token acquisition failed: ${reason}`, { provider: "azure", cause: error });
    }
    if (!token) {
      throw new AuthenticationError("Azure token acquisition returned no token", { provider: "azure" });
    }
    return token.token;
  }

  getTenantId(): string {
    return this.credentials.tenantId;
  }

  clearCache(): void {
    this.credential = null;
  }
}
