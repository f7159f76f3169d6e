import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";

import { ArchiveEntryError, ParseError } from "../../shared/cli-errors";

const BLOCK_SIZE = 512;

export interface TarEntry {
  name: string;
  type: number;
  size: number;
  content: Buffer | null;
}

interface TarHeader {
  name: string;
  typeFlag: number;
  size: number;
}

export function parseTarBuffer(buffer: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;
  let paxPath: string | undefined;

  while (offset + BLOCK_SIZE <= buffer.length) {
    const header = parseHeader(buffer.subarray(offset, offset + BLOCK_SIZE));
    if (!header) {
      break;
    }

    offset += BLOCK_SIZE;
    const body = buffer.subarray(offset, offset + header.size);
    offset += paddedSize(header.size);

    if (header.typeFlag === 0x78) {
      paxPath = readPaxPath(body) ?? paxPath;
      continue;
    }

    // Global PAX headers carry no per-entry name.
    if (header.typeFlag === 0x67) {
      continue;
    }

    entries.push({
      name: paxPath ?? header.name,
      type: normalizeType(header.typeFlag),
      size: header.size,
      content: header.size > 0 ? Buffer.from(body) : null,
    });
    paxPath = undefined;
  }

  return entries;
}

/**
 * Reads one entry from a tar file on disk. Headers are read block by block and
 * bodies of other entries are skipped by offset.
 */
export function readTarEntry(filePath: string, entryName: string): Buffer {
  const wanted = normalizeEntryName(entryName);
  const fd = openArchive(filePath);

  try {
    const headerBlock = Buffer.alloc(BLOCK_SIZE);
    let position = 0;
    let paxPath: string | undefined;

    while (true) {
      const read = fs.readSync(fd, headerBlock, 0, BLOCK_SIZE, position);
      if (read < BLOCK_SIZE) {
        break;
      }

      const header = parseHeader(headerBlock);
      if (!header) {
        break;
      }

      const bodyPosition = position + BLOCK_SIZE;
      position = bodyPosition + paddedSize(header.size);

      if (header.typeFlag === 0x78) {
        paxPath = readPaxPath(readBody(fd, bodyPosition, header.size, filePath, header.name)) ?? paxPath;
        continue;
      }

      if (header.typeFlag === 0x67) {
        continue;
      }

      const name = paxPath ?? header.name;
      paxPath = undefined;

      if (normalizeEntryName(name) === wanted && normalizeType(header.typeFlag) === 0) {
        return readBody(fd, bodyPosition, header.size, filePath, name);
      }
    }
  } finally {
    fs.closeSync(fd);
  }

  throw new ArchiveEntryError("entry", filePath, entryName);
}

export function findTarEntry(entries: TarEntry[], entryName: string): TarEntry | undefined {
  const wanted = normalizeEntryName(entryName);
  return entries.find((entry) => entry.type === 0 && normalizeEntryName(entry.name) === wanted);
}

export function gunzipLayer(buffer: Buffer, label: string): Buffer {
  if (!looksLikeGzip(buffer)) {
    throw new ParseError(`Layer ${label} is expected to be gzip-compressed, but gzip header was not found.`, [
      "Rebuild the package; layers inside package artifacts are always .tar.gz.",
    ]);
  }

  return zlib.gunzipSync(buffer);
}

export function normalizeEntryName(rawPath: string): string {
  let stripped = rawPath.replace(/\\/g, "/").replace(/^\/+/, "");
  while (stripped.startsWith("./")) {
    stripped = stripped.slice(2);
  }
  return stripped ? path.posix.normalize(stripped) : stripped;
}

function openArchive(filePath: string): number {
  try {
    return fs.openSync(filePath, "r");
  } catch (error) {
    throw new ParseError(`Unable to open archive ${filePath}.`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

function readBody(fd: number, position: number, size: number, filePath: string, entryName: string): Buffer {
  const body = Buffer.alloc(size);
  let filled = 0;
  while (filled < size) {
    const read = fs.readSync(fd, body, filled, size - filled, position + filled);
    if (read <= 0) {
      break;
    }
    filled += read;
  }

  if (filled < size) {
    throw new ParseError(`Archive ${filePath} is truncated inside entry '${entryName}'.`, [
      `Expected ${size} bytes, found ${filled}.`,
      "Rebuild the package so the artifact is written completely.",
    ]);
  }
  return body;
}

function parseHeader(block: Buffer): TarHeader | null {
  if (block.every((byte) => byte === 0)) {
    return null;
  }

  const name = readTarString(block, 0, 100);
  const size = parseInt(readTarString(block, 124, 12).trim(), 8) || 0;
  const typeFlag = block[156];

  const magic = readTarString(block, 257, 6);
  let fullName = name;
  if (magic === "ustar" || magic === "ustar\0") {
    const prefix = readTarString(block, 345, 155);
    if (prefix) {
      fullName = `${prefix}/${name}`;
    }
  }

  return { name: fullName, typeFlag, size };
}

function readPaxPath(body: Buffer): string | undefined {
  // Records are "<len> <key>=<value>\n".
  for (const record of body.toString("utf8").split("\n")) {
    const spaceIndex = record.indexOf(" ");
    const pair = spaceIndex === -1 ? record : record.slice(spaceIndex + 1);
    if (pair.startsWith("path=")) {
      return pair.slice("path=".length);
    }
  }
  return undefined;
}

function normalizeType(typeFlag: number): number {
  if (typeFlag === 0 || typeFlag === 0x30) {
    return 0;
  }
  if (typeFlag === 0x35) {
    return 5;
  }
  if (typeFlag === 0x32) {
    return 2;
  }
  if (typeFlag === 0x31) {
    return 1;
  }
  return typeFlag;
}

function paddedSize(size: number): number {
  return Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;
}

function looksLikeGzip(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x1f && buffer[1] === 0x8b;
}

function readTarString(buffer: Buffer, offset: number, length: number): string {
  const slice = buffer.subarray(offset, offset + length);
  const nullIndex = slice.indexOf(0);
  const end = nullIndex === -1 ? length : nullIndex;
  return slice.subarray(0, end).toString("utf8");
}
