import type pino from "pino";
import { decryptText, encryptText } from "../crypto.js";
import type { DbClient } from "../db.js";
import { AuthError } from "../errors.js";

export interface OAuthToken {
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
  scope?: string;
}

const PROVIDER = "google";

export class TokenStore {
  constructor(
    private readonly db: DbClient,
    private readonly encryptionKey: string,
    private readonly logger: pino.Logger,
  ) {}

  get(tokenKey = "default"): OAuthToken | undefined {
    const row = this.db.getToken(PROVIDER, tokenKey);
    if (!row) {
      return undefined;
    }

    try {
      return {
        accessToken: decryptText(row.access_token, this.encryptionKey),
        refreshToken: decryptText(row.refresh_token, this.encryptionKey),
        expiresAt: row.expiry_ts,
        scope: row.scopes ?? undefined,
      };
    } catch (error) {
      this.logger.error({ tokenKey, err: error }, "Failed to decrypt token from storage");
      throw new AuthError("Unable to decrypt stored Google token. Check TOKEN_ENCRYPTION_KEY.", {
        cause: error,
      });
    }
  }

  save(token: OAuthToken, tokenKey = "default") {
    this.db.upsertToken({
      provider: PROVIDER,
      token_key: tokenKey,
      access_token: encryptText(token.accessToken, this.encryptionKey),
      refresh_token: encryptText(token.refreshToken, this.encryptionKey),
      expiry_ts: token.expiresAt,
      scopes: token.scope ?? null,
      updated_at: new Date().toISOString(),
    });
  }
}
