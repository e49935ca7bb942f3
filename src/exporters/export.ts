import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ExportDocument, FormattedWork } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Document ────────────────────────────────────────────

/**
 * Assemble the output document: formatted works plus run metadata.
 * `query` echoes the effective query parameters.
 */
export function buildExportDocument(
    works: FormattedWork[],
    query: Record<string, unknown>,
    now: Date = new Date()
): ExportDocument {
    return {
        works,
        metadata: {
            total: works.length,
            timestamp: now.toISOString(),
            query,
        },
    };
}

// ─── Writer ──────────────────────────────────────────────

/**
 * Write the document as pretty-printed UTF-8 JSON, creating parent directories as needed.
 */
export function writeExport(outputPath: string, document: ExportDocument): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    getLogger().info({ outputPath, works: document.metadata.total }, 'Export written');
}
