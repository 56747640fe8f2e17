import type { LoggerMethods } from '@codetable/logger';
import type { Manifest, SpineEntry } from '@codetable/model';
import type { Readable } from 'node:stream';

import type { EpubSource } from '../types';

import * as cheerio from 'cheerio';
import { posix } from 'node:path';
import * as yauzl from 'yauzl';

import { ArchiveOpenError } from '../errors';

const CONTAINER_PATH = 'META-INF/container.xml';

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch {
    // malformed escapes are kept as written
    return href;
  }
}

/**
 * Resolve an OPF href to a full archive path
 *
 * Fragments are dropped and percent-encoding decoded.
 */
export function resolveHref(opfPath: string, href: string): string {
  const [withoutFragment] = href.split('#');
  const decoded = decodeHref(withoutFragment);
  const opfDir = posix.dirname(opfPath);
  return posix.normalize(
    opfDir === '.' ? decoded : posix.join(opfDir, decoded),
  );
}

/**
 * Locate the root package document from container.xml
 */
export function parseContainer(containerXml: string): string | undefined {
  const $ = cheerio.load(containerXml, { xml: true });
  return $('rootfile').first().attr('full-path') || undefined;
}

/**
 * Read manifest and spine from the OPF package document
 *
 * @returns undefined when the document has no spine element
 */
export function parsePackageDocument(
  opfXml: string,
  opfPath: string,
): { manifest: Manifest; spine: SpineEntry[] } | undefined {
  const $ = cheerio.load(opfXml, { xml: true });
  const spineElement = $('spine').first();
  if (spineElement.length === 0) {
    return undefined;
  }

  const manifest: Record<string, string> = {};
  $('manifest item').each((_, element) => {
    const id = $(element).attr('id');
    const href = $(element).attr('href');
    if (id && href) {
      manifest[id] = resolveHref(opfPath, href);
    }
  });

  const spine: SpineEntry[] = [];
  spineElement.find('itemref').each((_, element) => {
    const idref = $(element).attr('idref');
    if (idref) {
      spine.push({ id: idref });
    }
  });

  return { manifest: Object.freeze(manifest), spine };
}

/**
 * EpubArchive reads content files straight out of a zip-packaged EPUB
 *
 * The zip file stays open (entries are read on demand) until `close()`.
 *
 * @example
 * ```typescript
 * const archive = await EpubArchive.open(logger, 'book.epub');
 * const html = await archive.readText(archive.manifest[archive.spine[0].id]);
 * archive.close();
 * ```
 */
export class EpubArchive implements EpubSource {
  private constructor(
    private readonly zipfile: yauzl.ZipFile,
    private readonly entries: ReadonlyMap<string, yauzl.Entry>,
    readonly opfPath: string,
    readonly manifest: Manifest,
    readonly spine: readonly SpineEntry[],
  ) {}

  /**
   * Open an EPUB and parse its root package document
   *
   * @throws ArchiveOpenError when the zip cannot be read or has no usable
   * container.xml, rootfile, OPF or spine
   */
  static async open(
    logger: LoggerMethods,
    epubPath: string,
  ): Promise<EpubArchive> {
    let zipfile: yauzl.ZipFile;
    try {
      zipfile = await EpubArchive.openZip(epubPath);
    } catch (error) {
      throw ArchiveOpenError.fromError(`Failed to open ${epubPath}`, error);
    }

    try {
      const entries = await EpubArchive.listEntries(zipfile);
      const containerEntry = entries.get(CONTAINER_PATH);
      if (!containerEntry) {
        throw new ArchiveOpenError(`${CONTAINER_PATH} not found`);
      }

      const opfPath = parseContainer(
        await EpubArchive.readEntry(zipfile, containerEntry),
      );
      if (!opfPath) {
        throw new ArchiveOpenError(`No rootfile found in ${CONTAINER_PATH}`);
      }

      const opfEntry = entries.get(opfPath);
      if (!opfEntry) {
        throw new ArchiveOpenError(`Package document ${opfPath} not found`);
      }

      const parsed = parsePackageDocument(
        await EpubArchive.readEntry(zipfile, opfEntry),
        opfPath,
      );
      if (!parsed) {
        throw new ArchiveOpenError(`Package document ${opfPath} has no spine`);
      }

      logger.info(
        `[EpubArchive] Opened ${epubPath}: ${parsed.spine.length} spine files, ${Object.keys(parsed.manifest).length} manifest items`,
      );

      return new EpubArchive(
        zipfile,
        entries,
        opfPath,
        parsed.manifest,
        parsed.spine,
      );
    } catch (error) {
      zipfile.close();
      if (error instanceof ArchiveOpenError) {
        throw error;
      }
      throw ArchiveOpenError.fromError(`Failed to read ${epubPath}`, error);
    }
  }

  /**
   * Read a content file as UTF-8 text
   *
   * @throws Error when the archive has no entry at that path
   */
  async readText(filePath: string): Promise<string> {
    const entry = this.entries.get(filePath);
    if (!entry) {
      throw new Error(`Archive entry not found: ${filePath}`);
    }
    return EpubArchive.readEntry(this.zipfile, entry);
  }

  close(): void {
    this.zipfile.close();
  }

  private static openZip(epubPath: string): Promise<yauzl.ZipFile> {
    return new Promise((resolve, reject) => {
      yauzl.open(
        epubPath,
        { lazyEntries: true, autoClose: false },
        (err, zipfile) => {
          if (err || !zipfile) {
            reject(err || new Error('Failed to open zip file'));
            return;
          }
          resolve(zipfile);
        },
      );
    });
  }

  private static listEntries(
    zipfile: yauzl.ZipFile,
  ): Promise<Map<string, yauzl.Entry>> {
    return new Promise((resolve, reject) => {
      const entries = new Map<string, yauzl.Entry>();

      zipfile.on('entry', (entry: yauzl.Entry) => {
        if (!/\/$/.test(entry.fileName)) {
          entries.set(entry.fileName, entry);
        }
        zipfile.readEntry();
      });
      zipfile.on('end', () => {
        resolve(entries);
      });
      zipfile.on('error', reject);

      zipfile.readEntry();
    });
  }

  private static readEntry(
    zipfile: yauzl.ZipFile,
    entry: yauzl.Entry,
  ): Promise<string> {
    return new Promise((resolve, reject) => {
      zipfile.openReadStream(entry, (err, readStream) => {
        if (err || !readStream) {
          reject(err || new Error('Failed to open read stream'));
          return;
        }
        EpubArchive.collect(readStream).then(resolve, reject);
      });
    });
  }

  private static collect(readStream: Readable): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      readStream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      readStream.on('end', () => {
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      readStream.on('error', reject);
    });
  }
}
