import dotenv from 'dotenv';

import { loadConfig } from '../src/config';
import { describeError } from '../src/errors';
import { VectorIndex } from '../src/rag/vectorIndex';

dotenv.config();

/**
 * Maintenance hook: rewrites the persisted vector index without its
 * soft-deleted records. Run it while the server is stopped; a running server
 * keeps its own in-memory copy and would overwrite the result on its next
 * persist.
 */
const main = async (): Promise<void> => {
  const config = loadConfig();
  const index = await VectorIndex.open({ dimension: config.embedding.dimension, filePath: config.indexPath });

  const before = await index.stats();
  const dropped = await index.compact();

  if (dropped === 0) {
    console.log(`Index ${config.indexPath} has no soft-deleted records (${before.total} total).`);
    return;
  }

  await index.persist();

  const after = await index.stats();
  console.log(`Compacted ${config.indexPath}: dropped ${dropped} records, ${after.total} remain.`);
};

main().catch((error: unknown) => {
  console.error(`Compaction failed: ${describeError(error)}`);
  process.exit(1);
});
