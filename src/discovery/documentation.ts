/**
 * Documentation Files
 *
 * Lists the PDF guides shipped in the documentation directory. The category
 * of a file is the part of its name before " - ", e.g.
 * "Deployments - Overview.pdf" → "Deployments".
 */

import { existsSync, readdirSync } from 'node:fs';
import { extname, join, relative, sep } from 'node:path';
import { notFound, type NotFoundResult } from '../errors.js';

const CATEGORY_SEPARATOR = ' - ';

export interface DocumentationFile {
  filename: string;
  category: string;
  /** Relative to the package root, with forward slashes. */
  path: string;
}

export interface DocumentationFilesResult {
  documentation_path: string;
  total_files: number;
  files: DocumentationFile[];
}

export function getDocumentationFiles(
  docsDir: string,
  rootDir: string
): DocumentationFilesResult | NotFoundResult<{ documentation_path: string }> {
  if (!existsSync(docsDir)) {
    return notFound('Documentation directory not found', { documentation_path: docsDir });
  }

  const files = readdirSync(docsDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.pdf')
    .map((entry) => ({
      filename: entry.name,
      category: categoryOf(entry.name),
      path: relative(rootDir, join(docsDir, entry.name)).split(sep).join('/'),
    }))
    .sort((a, b) => a.category.localeCompare(b.category) || a.filename.localeCompare(b.filename));

  return {
    documentation_path: docsDir,
    total_files: files.length,
    files,
  };
}

export function categoryOf(filename: string): string {
  const stem = filename.slice(0, filename.length - extname(filename).length);
  const index = stem.indexOf(CATEGORY_SEPARATOR);
  return index === -1 ? stem : stem.slice(0, index);
}
