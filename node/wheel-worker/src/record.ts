export type ManifestRecord = {
  archivePath: string;
  contentHashBase64Url: string;
  sizeBytes: number;
};

/** URL-safe base64 without padding, the digest encoding RECORD uses. */
export function urlsafeB64(digest: Uint8Array): string {
  return Buffer.from(digest).toString('base64url');
}

/**
 * Append-only list of written entries. Order is the physical write order and is never
 * changed, so RECORD lines line up with the archive's entries.
 */
export class RecordBuilder {
  private readonly entries: ManifestRecord[] = [];

  add(record: ManifestRecord): void {
    this.entries.push(record);
  }

  records(): readonly ManifestRecord[] {
    return this.entries;
  }

  /** RECORD body; `recordPath` closes it with empty hash and size. */
  render(recordPath: string): Uint8Array {
    let out = '';
    for (const r of this.entries) {
      out += `${r.archivePath},sha256=${r.contentHashBase64Url},${r.sizeBytes}\n`;
    }
    out += `${recordPath},,\n`;
    return new TextEncoder().encode(out);
  }
}
