import { createAppAuth } from "@octokit/auth-app";
import { loadEnv } from "../config/env.js";
import type { InstallationToken } from "../review/types.js";
import { AuthError, TransientError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { getOctokit } from "./client.js";
import { readStatus, toHostError } from "./errors.js";

const log = createChildLogger({ module: "github-auth" });

let _appAuth: ReturnType<typeof createAppAuth> | null = null;

function getAppAuth() {
  if (_appAuth) return _appAuth;
  const env = loadEnv();
  _appAuth = createAppAuth({
    appId: env.GITHUB_APP_ID,
    privateKey: env.GITHUB_PRIVATE_KEY,
  });
  return _appAuth;
}

/**
 * Fresh app JWT (iss = app id, valid for about ten minutes).
 * Generated per exchange and never cached.
 */
export async function createAppJwt(): Promise<string> {
  try {
    const { token } = await getAppAuth()({ type: "app" });
    return token;
  } catch (err) {
    throw new AuthError("Could not sign app JWT", { cause: err });
  }
}

/** Trades an app JWT for an installation access token */
export async function exchangeInstallationToken(
  installationId: number
): Promise<InstallationToken> {
  const jwt = await createAppJwt();
  const octokit = getOctokit(jwt);

  try {
    const { data } = await octokit.apps.createInstallationAccessToken({
      installation_id: installationId,
    });
    const expiresAt = new Date(data.expires_at);
    log.debug({ installationId, expiresAt }, "Obtained installation token");
    return { installationId, token: data.token, expiresAt };
  } catch (err) {
    const mapped = toHostError(err, `Token exchange for installation ${installationId}`);
    // Only a request that never got an answer stays transient
    if (readStatus(err) === undefined && mapped instanceof TransientError) throw mapped;
    throw mapped instanceof AuthError
      ? mapped
      : new AuthError(mapped.message, { cause: err });
  }
}
