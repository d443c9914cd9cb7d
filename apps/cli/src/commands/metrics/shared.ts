import path from 'node:path';
import fg from 'fast-glob';

/**
 * Expand annotation file paths and globs into a sorted, de-duplicated list of JSON files.
 * Each input is tried as a literal path first, so file names with glob characters still work.
 */
export async function resolveAnnotationPaths(inputs: readonly string[], cwd: string): Promise<string[]> {
  const patterns = inputs.map((value) => value.trim()).filter((value) => value.length > 0);
  if (patterns.length === 0) {
    throw new Error('No annotation files provided.');
  }

  const found = new Set<string>();
  const unmatched: string[] = [];

  for (const pattern of patterns) {
    const literal = await findFiles(fg.escapePath(toGlob(pattern)), cwd);
    const matches = literal.length > 0 ? literal : await findFiles(toGlob(pattern), cwd);
    const annotationFiles = matches.filter((filePath) => filePath.toLowerCase().endsWith('.json'));
    if (annotationFiles.length === 0) {
      unmatched.push(pattern);
    }
    for (const filePath of annotationFiles) {
      found.add(path.normalize(filePath));
    }
  }

  if (unmatched.length > 0) {
    throw new Error(
      `No annotation files matched: ${unmatched.join(', ')}. Provide JSON paths or globs (e.g., "annotations/**/*.json").`,
    );
  }

  return Array.from(found).sort();
}

function findFiles(pattern: string, cwd: string): Promise<string[]> {
  return fg(pattern, { cwd, absolute: true, onlyFiles: true, dot: true });
}

// fast-glob only takes forward slashes.
function toGlob(pattern: string): string {
  return pattern.replace(/\\/g, '/');
}
