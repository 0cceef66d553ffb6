// This module loads the static reference document once at startup and keeps it in memory.

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { errorForLog } from '../utils/logger.js';

export interface ReferenceDocument {
  fileName: string;
  contentType: string;
  bytes: Uint8Array;
}

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8'
};

// This helper returns null instead of failing startup when the document is missing or unreadable.
export async function loadReferenceDocument(path: string, logger: FastifyBaseLogger): Promise<ReferenceDocument | null> {
  try {
    const bytes = await readFile(path);
    const fileName = basename(path);
    logger.info({ event: 'reference_document_loaded', path, byteLength: bytes.byteLength }, 'reference_document_loaded');

    return {
      fileName,
      contentType: CONTENT_TYPES[extname(fileName).toLowerCase()] ?? 'application/octet-stream',
      bytes: new Uint8Array(bytes)
    };
  } catch (error) {
    logger.warn({ event: 'reference_document_unavailable', path, error: errorForLog(error) }, 'reference_document_unavailable');
    return null;
  }
}
