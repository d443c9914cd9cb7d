import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { MetricsReport } from '@fieldcheck/core';
import { stringify as stringifyYaml } from 'yaml';

export type OutputFormat = 'json' | 'yaml';

export function inferOutputFormat(filePath: string): OutputFormat {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.json':
      return 'json';
    case '.yaml':
    case '.yml':
      return 'yaml';
    default:
      throw new Error(
        `Unsupported output extension '${extension || '(none)'}' for ${filePath}. Use .json, .yaml or .yml`,
      );
  }
}

export function serializeMetricsReport(report: MetricsReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(report, null, 2)}\n`;
    case 'yaml':
      return stringifyYaml(report, {
        indent: 2,
        lineWidth: 0, // Disable line wrapping
      });
    default: {
      const exhaustiveCheck: never = format;
      throw new Error(`Unsupported output format: ${exhaustiveCheck}`);
    }
  }
}

export async function writeMetricsReport(filePath: string, report: MetricsReport): Promise<void> {
  const content = serializeMetricsReport(report, inferOutputFormat(filePath));
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf8');
}

export async function writeNarrativeReport(filePath: string, narrative: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${narrative}\n`, 'utf8');
}
