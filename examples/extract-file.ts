/**
 * Extract from a local HTML, markdown or PDF file, optionally against a protected
 * blueprint:
 *
 *   STRUCTURA_API_KEY=... npx tsx examples/extract-file.ts ./posting.html job-posting
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createExtractionService, loadConfig } from '../src/index.js';

async function main() {
  const [filePath, domain = 'job-posting'] = process.argv.slice(2);
  if (!filePath) {
    console.error('Usage: tsx examples/extract-file.ts <file> [domain]');
    process.exit(2);
  }

  const service = await createExtractionService(await loadConfig());
  const result = await service.extractFromFile({
    domain,
    filename: path.basename(filePath),
    content: await fs.readFile(filePath),
    apiKey: process.env.STRUCTURA_API_KEY,
  });

  if (result.success) {
    console.log(JSON.stringify(result.data, null, 2));
  } else {
    console.error(`${result.kind}: ${result.message}`);
    console.error(`States: ${result.diagnostics.states.join(' -> ')}`);
    process.exitCode = 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(1);
  });
}
