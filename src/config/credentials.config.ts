import fs from "fs";
import path from "path";

/**
 * Hosting platforms only give us environment variables, so the Google service account
 * arrives base64-encoded and is written to disk before the Google clients are built.
 * An existing file is left untouched.
 */
export const ensureCredentialsFile = (credentialsPath: string, encoded: string): string => {
  const resolved = path.resolve(credentialsPath);

  if (fs.existsSync(resolved)) {
    return resolved;
  }

  if (!encoded.trim()) {
    throw new Error("GOOGLE_CREDENTIALS_BASE64 not found and no credentials file present");
  }

  const decoded = Buffer.from(encoded, "base64");
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, decoded);
  console.log(`🔑 Service account credentials written to ${resolved}`);

  return resolved;
};
