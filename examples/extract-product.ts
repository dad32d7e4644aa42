/**
 * Extract a product from a shop page with the open e-commerce blueprint.
 *
 *   OPENAI_API_KEY=... npx tsx examples/extract-product.ts https://shop.example.com/item/42
 */

import { createExtractionService, loadConfig, setupLogging } from '../src/index.js';

async function main() {
  const url = process.argv[2];
  if (!url) {
    console.error('Usage: tsx examples/extract-product.ts <product-url>');
    process.exit(2);
  }

  const config = await loadConfig();
  setupLogging({ logLevel: config.logging.level });
  const service = await createExtractionService(config);

  const result = await service.extract({ domain: 'e-commerce', url });
  if (!result.success) {
    console.error(`${result.kind}: ${result.message}`);
    for (const violation of result.violations ?? []) {
      console.error(`  ${violation.path || '(root)'}: ${violation.message}`);
    }
    process.exit(1);
  }

  console.log(JSON.stringify(result.data, null, 2));
  console.log(
    `Done in ${result.diagnostics.elapsedMs}ms with ${result.diagnostics.structuringInvocations} model call(s)`
  );
}

// Run if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(1);
  });
}
