import { pathToFileURL } from 'node:url';
import { config } from '../src/config/app.js';
import { getModelClient } from '../src/openai/openaiClient.js';
import { buildSchemeIndex } from '../src/retrieval/indexBuilder.js';
import { SqliteSchemeIndex } from '../src/retrieval/schemeIndex.js';
import { loadSchemes } from '../src/retrieval/schemes.js';
import { OpenAIEmbeddingService } from '../src/utils/embeddings.js';
import { describeError } from '../src/utils/errors.js';

async function main() {
  console.log('='.repeat(64));
  console.log('Government scheme index build');
  console.log('='.repeat(64));

  const index = new SqliteSchemeIndex(config.SCHEME_DB_PATH);
  try {
    console.log(`\nStep 1: Loading schemes from ${config.SCHEME_DATA_PATH}...`);
    const schemes = await loadSchemes(config.SCHEME_DATA_PATH);
    console.log(`Loaded ${schemes.length} schemes.`);

    console.log(`\nStep 2: Embedding with ${config.EMBEDDING_MODEL} and writing to ${config.SCHEME_DB_PATH}...`);
    const embedder = new OpenAIEmbeddingService(getModelClient(), {
      model: config.EMBEDDING_MODEL,
      batchSize: config.EMBEDDING_BATCH_SIZE
    });
    const summary = await buildSchemeIndex(schemes, embedder, index);

    console.log(`\nIndexed ${summary.indexed} schemes (${summary.total} in the index).`);
    console.log('Start the server with: npm run dev');
  } catch (error) {
    console.error('\nIndex build failed');
    console.error(describeError(error));
    process.exitCode = 1;
  } finally {
    index.close();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  await main();
}
