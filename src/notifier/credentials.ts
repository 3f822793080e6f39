// pattern: Functional Core
import type { ProviderName } from "../config";
import { providerApiKeyEnv } from "../llm/providers";

export type Environment = Readonly<Record<string, string | undefined>>;

export type DeliveryTarget =
  | { readonly mode: "slack"; readonly webhookUrl: string }
  | { readonly mode: "dry-run" };

export type Credentials = {
  readonly githubToken: string;
  readonly delivery: DeliveryTarget;
};

export type CredentialsResult =
  | { readonly ok: true; readonly credentials: Credentials }
  | { readonly ok: false; readonly error: string };

function missing(name: string): CredentialsResult {
  return { ok: false, error: `${name} environment variable is not set` };
}

/**
 * Checks the secrets a run needs before any network call is made.
 * Order of checks: GitHub token, the provider's API key, Slack webhook
 * (skipped for dry runs). Empty strings count as unset.
 */
export function resolveCredentials(
  env: Environment,
  provider: ProviderName,
  options: { readonly dryRun?: boolean } = {},
): CredentialsResult {
  const githubToken = env["GITHUB_TOKEN"];
  if (!githubToken) return missing("GITHUB_TOKEN");

  const apiKeyName = providerApiKeyEnv[provider];
  if (apiKeyName && !env[apiKeyName]) return missing(apiKeyName);

  if (options.dryRun) {
    return { ok: true, credentials: { githubToken, delivery: { mode: "dry-run" } } };
  }

  const webhookUrl = env["SLACK_WEBHOOK_URL"];
  if (!webhookUrl) return missing("SLACK_WEBHOOK_URL");

  return {
    ok: true,
    credentials: { githubToken, delivery: { mode: "slack", webhookUrl } },
  };
}
