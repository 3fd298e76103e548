import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export type ServiceAccount = {
  private_key: string;
  [key: string]: unknown;
};

/**
 * Writes the service account JSON to a file only the current user can read;
 * the SDK clients authenticate from that path.
 */
export function writeTempCredentials(serviceAccount: ServiceAccount, dir = os.tmpdir()): string {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, `ga4-credentials-${crypto.randomUUID()}.json`);
  fs.writeFileSync(filePath, JSON.stringify(serviceAccount), { encoding: "utf8", mode: 0o600 });
  return filePath;
}

export function removeTempCredentials(filePath: string) {
  fs.rmSync(filePath, { force: true });
}
