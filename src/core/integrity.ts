import fs from "node:fs";
import crypto from "node:crypto";

export interface IntegrityVerifier {
  /** Hex digest of an in-memory buffer */
  digest(bytes: Uint8Array | string): string;
  /** Hex digest of a file, streamed */
  digestFile(filePath: string): Promise<string>;
  /** Case-insensitive hex comparison */
  verify(actual: string, expected: string): boolean;
}

export class Sha256Verifier implements IntegrityVerifier {
  digest(bytes: Uint8Array | string): string {
    return crypto.createHash("sha256").update(bytes).digest("hex");
  }

  async digestFile(filePath: string): Promise<string> {
    const hash = crypto.createHash("sha256");
    for await (const chunk of fs.createReadStream(filePath)) {
      hash.update(chunk);
    }
    return hash.digest("hex");
  }

  verify(actual: string, expected: string): boolean {
    const a = actual.trim().toLowerCase();
    const e = expected.trim().toLowerCase();
    return a.length > 0 && a === e;
  }
}

/** What a published checksum file says about one payload */
export type ChecksumLookup =
  | { status: "found"; digest: string }
  | { status: "no_entry"; reason: string };

/**
 * Read the expected digest for `fileName` from a published checksum file.
 *
 * Lines are "<digest>" or "<digest>  <file>" (sha256sum marks binary mode with
 * a leading "*" on the name). A line naming `fileName` wins. When lines name
 * files but none names this one, there is no entry for it. Bare digests apply
 * to any payload and the first one is used. The digest is returned lowercased
 * and otherwise as published, well-formed or not.
 */
export function parseChecksumText(text: string, fileName?: string): ChecksumLookup {
  const entries = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith("#"))
    .map((l) => {
      const [digest, ...rest] = l.split(/\s+/);
      return { digest: digest.toLowerCase(), name: rest.length > 0 ? rest.join(" ").replace(/^\*/, "") : undefined };
    });
  if (entries.length === 0) return { status: "no_entry", reason: "holds no digest" };
  if (fileName === undefined) return { status: "found", digest: entries[0].digest };

  const named = entries.find((e) => e.name === fileName);
  if (named) return { status: "found", digest: named.digest };
  if (entries.some((e) => e.name !== undefined)) {
    return { status: "no_entry", reason: `has no entry for ${fileName}` };
  }
  return { status: "found", digest: entries[0].digest };
}
