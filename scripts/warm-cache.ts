#!/usr/bin/env tsx

import dotenv from "dotenv";
import { createImageCache } from "../src/services/ImageCacheFactory.js";
import { parseIdentifier } from "../src/validation/schemas.js";

// Load environment variables from .env file
dotenv.config();

async function main() {
  const identifiers = process.argv.slice(2);
  if (identifiers.length === 0) {
    console.error("Usage: warm-cache <url-or-path>...");
    process.exitCode = 1;
    return;
  }

  const cache = createImageCache();
  let failed = 0;

  try {
    for (const input of identifiers) {
      const identifier = parseIdentifier(input);
      if (!identifier.ok) {
        console.error(`Skipping ${input}: ${identifier.error.message}`);
        failed++;
        continue;
      }

      const image = await cache.getImage(identifier.value);
      if (image) {
        console.log(`Cached ${identifier.value} (${image.width}x${image.height})`);
      } else {
        console.error(`Failed to cache ${identifier.value}`);
        failed++;
      }
    }

    await cache.flush();
    console.log("Cache stats:", cache.getStats());
  } finally {
    await cache.close();
  }

  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error("Cache warm-up failed:", error);
  process.exitCode = 1;
});
