/**
 * Supported Extension Cache
 *
 * Lazily loads the set of file extensions the converter accepts. Each
 * processor owns its own cache:
 * - the first caller starts the fetch and concurrent callers share it
 * - later callers read the cached snapshot
 * - empty results and failures are not cached, so the next caller retries
 *
 * A shared fetch runs with the signal of the caller that started it.
 */

import type { RequestOptions } from '../conversion/index.js';
import type { Logger } from '../logging/index.js';

export type ExtensionFetcher = (options: RequestOptions) => Promise<string[]>;

/**
 * Lowercase an extension and give it a leading dot ("PDF" → ".pdf").
 * Blank input yields ''.
 */
export function normalizeExtension(extension: string): string {
  const ext = extension.trim().toLowerCase();
  if (ext === '') {
    return '';
  }
  return ext.startsWith('.') ? ext : `.${ext}`;
}

export class SupportedExtensionCache {
  private snapshot: ReadonlySet<string> | null = null;
  private inFlight: Promise<ReadonlySet<string>> | null = null;
  private generation = 0;

  constructor(
    private readonly fetchExtensions: ExtensionFetcher,
    private readonly logger?: Logger
  ) {}

  /**
   * Cached extensions, fetching them on first use
   */
  async get(options: RequestOptions = {}): Promise<ReadonlySet<string>> {
    if (this.snapshot) {
      return this.snapshot;
    }
    if (!this.inFlight) {
      this.inFlight = this.load(options);
    }
    return this.inFlight;
  }

  async has(extension: string, options: RequestOptions = {}): Promise<boolean> {
    const extensions = await this.get(options);
    return extensions.has(normalizeExtension(extension));
  }

  /** Whether a snapshot is currently cached */
  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Drop the snapshot; the next `get` fetches again. A fetch already in
   * flight still resolves for its callers but is not cached.
   */
  invalidate(): void {
    this.snapshot = null;
    this.inFlight = null;
    this.generation++;
  }

  /**
   * Fetch the extension list again, replacing the snapshot
   */
  async refresh(options: RequestOptions = {}): Promise<ReadonlySet<string>> {
    this.invalidate();
    return this.get(options);
  }

  private async load(options: RequestOptions): Promise<ReadonlySet<string>> {
    const generation = this.generation;
    try {
      const raw = await this.fetchExtensions(options);
      const extensions = new Set(raw.map(normalizeExtension).filter((ext) => ext !== ''));

      if (generation === this.generation && extensions.size > 0) {
        this.snapshot = extensions;
        this.logger?.debug('Cached supported extensions', { count: extensions.size });
      } else if (extensions.size === 0) {
        this.logger?.warn('Converter reported no supported extensions');
      }
      return extensions;
    } finally {
      if (generation === this.generation) {
        this.inFlight = null;
      }
    }
  }
}
