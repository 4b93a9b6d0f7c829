import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto";

const FORMAT_VERSION = "v2";
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

function deriveKey(secret: string, salt: Buffer): Buffer {
  return scryptSync(secret, salt, 32);
}

/** AES-256-GCM; output is `v2:<base64(salt | iv | tag | ciphertext)>`. */
export function encryptText(plainText: string, secret: string): string {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv("aes-256-gcm", deriveKey(secret, salt), iv);
  const encrypted = Buffer.concat([cipher.update(plainText, "utf8"), cipher.final()]);
  const payload = Buffer.concat([salt, iv, cipher.getAuthTag(), encrypted]);
  return `${FORMAT_VERSION}:${payload.toString("base64")}`;
}

export function decryptText(encoded: string, secret: string): string {
  const separator = encoded.indexOf(":");
  const version = separator > 0 ? encoded.slice(0, separator) : "";
  if (version !== FORMAT_VERSION) {
    throw new Error(`Unsupported ciphertext format '${version || "(none)"}'`);
  }

  const payload = Buffer.from(encoded.slice(separator + 1), "base64");
  const salt = payload.subarray(0, SALT_LENGTH);
  const iv = payload.subarray(SALT_LENGTH, SALT_LENGTH + IV_LENGTH);
  const tag = payload.subarray(SALT_LENGTH + IV_LENGTH, SALT_LENGTH + IV_LENGTH + TAG_LENGTH);
  const encrypted = payload.subarray(SALT_LENGTH + IV_LENGTH + TAG_LENGTH);

  const decipher = createDecipheriv("aes-256-gcm", deriveKey(secret, salt), iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString("utf8");
}
