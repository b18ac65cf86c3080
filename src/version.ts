import { readFileSync } from "node:fs";
import { z } from "zod";

const PackageManifestSchema = z.object({ version: z.string().min(1) });

// package.json sits one level above both src/ and dist/.
const manifestUrl = new URL("../package.json", import.meta.url);

export function readPackageVersion(url: URL = manifestUrl): string {
  const manifest: unknown = JSON.parse(readFileSync(url, "utf8"));
  return PackageManifestSchema.parse(manifest).version;
}

export const VERSION = readPackageVersion();
