#!/usr/bin/env node
import { program } from 'commander';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { OpenSearchBackend } from '../backends/opensearch.js';
import { Chunker } from '../chunking/chunker.js';
import { loadConfig, opensearchUrl, type RagConfig } from '../config.js';
import { RagError, describeError } from '../core/errors.js';
import { createEmbedder } from '../embedders/index.js';
import { Ingester } from '../ingestion/ingester.js';
import { Retriever } from '../retrieval/retriever.js';
import type { Logger } from '../types/logger.js';
import colors from '../utils/colors.js';
import { createCliLogger } from '../utils/logger.js';
import { RagShell } from './shell.js';

/**
 * Load environment variables from a .env file into process.env.
 * Variables already set in the environment win.
 */
async function loadEnvFile(filePath: string | boolean): Promise<void> {
  const envPath = typeof filePath === 'string' ? filePath : join(process.cwd(), '.env');

  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    console.error(colors.yellow(`Warning: could not read ${envPath}: ${describeError(error)}`));
    return;
  }

  let loaded = 0;
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const match = trimmed.match(/^([^=]+)=(.*)$/);
    if (!match) continue;

    const key = match[1].trim();
    let value = match[2].trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (process.env[key] === undefined) {
      process.env[key] = value;
      loaded++;
    }
  }

  console.error(colors.gray(`Loaded ${loaded} variables from ${envPath}`));
}

async function readVersion(): Promise<string> {
  try {
    const raw = await fs.readFile(new URL('../../package.json', import.meta.url), 'utf-8');
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

interface Services {
  config: RagConfig;
  logger: Logger;
  backend: OpenSearchBackend;
}

function createServices(): Services {
  const config = loadConfig();
  const logger = createCliLogger(config.logLevel);
  const backend = new OpenSearchBackend({
    node: opensearchUrl(config.opensearch),
    index: config.index.name,
    username: config.opensearch.username,
    password: config.opensearch.password,
    verifyCerts: config.opensearch.verifyCerts,
    efSearch: config.index.efSearch,
    logger,
  });
  return { config, logger, backend };
}

function createRetriever({ config, logger, backend }: Services): Retriever {
  return new Retriever({
    embedder: createEmbedder(config),
    backend,
    logger,
    alpha: config.retrieval.alpha,
    defaultK: config.retrieval.topK,
  });
}

/**
 * Run a command against fresh services, report failures and release connections.
 */
async function run(action: (services: Services) => Promise<void>): Promise<void> {
  let services: Services | undefined;
  try {
    services = createServices();
    await action(services);
  } catch (error) {
    console.error(colors.red(`Error: ${describeError(error)}`));
    if (error instanceof RagError) {
      for (const suggestion of error.suggestions) {
        console.error(colors.gray(`  - ${suggestion}`));
      }
    }
    process.exitCode = 1;
  } finally {
    await services?.backend.close();
  }
}

function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new RagError(`Option ${name} expects a number, got '${value}'`);
  }
  return parsed;
}

/**
 * CLI Entry Point
 */
async function main() {
  const version = await readVersion();

  program
    .name('hybrid-rag')
    .description('Hybrid (vector + keyword) retrieval over an OpenSearch index')
    .version(version)
    .option('-e, --env [path]', 'Load a .env file from the current directory or the given path')
    .hook('preAction', async () => {
      const { env } = program.opts<{ env?: string | boolean }>();
      if (env) {
        await loadEnvFile(env);
      }
    });

  program
    .command('create-index')
    .description('Create the k-NN enabled index')
    .option('--recreate', 'Delete and recreate the index if it exists')
    .action(async (options: { recreate?: boolean }) => {
      await run(async ({ config, backend }) => {
        const cluster = await backend.info();
        console.log(colors.gray(`Connected to ${cluster.clusterName} (OpenSearch ${cluster.version})`));

        const outcome = await backend.ensureIndex(config.index, { recreate: options.recreate });
        if (outcome === 'exists') {
          console.log(colors.yellow(`Index '${config.index.name}' already exists. Use --recreate to rebuild it.`));
          return;
        }

        console.log(colors.green(`Index '${config.index.name}' ${outcome}`));
        console.log(`  Vector field: text_vector (dimension ${config.index.dimension})`);
        console.log(`  Engine: ${config.index.engine}, space: ${config.index.spaceType}`);
        console.log(
          `  HNSW: m=${config.index.m}, ef_construction=${config.index.efConstruction}, ef_search=${config.index.efSearch}`
        );
      });
    });

  program
    .command('ingest [directory]')
    .description('Load, chunk, embed and index documents (default: RAG_DATA_DIR)')
    .action(async (directory: string | undefined) => {
      await run(async ({ config, logger, backend }) => {
        const ingester = new Ingester({
          chunker: new Chunker(config.chunking),
          embedder: createEmbedder(config),
          backend,
          batchSize: config.embedding.batchSize,
          logger,
        });

        const report = await ingester.ingestDirectory(directory ?? config.dataDir);
        if (report.documents === 0) {
          console.log(colors.yellow('No documents found.'));
          return;
        }

        console.log(colors.green('Ingestion complete'));
        console.log(`  Documents: ${report.documents}`);
        console.log(`  Chunks:    ${report.chunks}`);
        console.log(`  Indexed:   ${report.indexed}`);
        console.log(`  Failed:    ${report.errors.length}`);
        console.log(`  In index:  ${report.total}`);
      });
    });

  program
    .command('query <text...>')
    .description('Retrieve the chunks most relevant to a query')
    .option('-m, --mode <mode>', 'Search mode: vector, keyword, hybrid', 'hybrid')
    .option('-k, --top-k <n>', 'Number of results (default: TOP_K_RESULTS)')
    .option('-a, --alpha <weight>', 'Vector weight for hybrid fusion, 0..1 (default: HYBRID_SEARCH_ALPHA)')
    .option('--context', 'Also print the prompt context built from the results')
    .action(async (words: string[], options: { mode: string; topK?: string; alpha?: string; context?: boolean }) => {
      await run(async (services) => {
        const retriever = createRetriever(services);
        const query = words.join(' ');
        const k = parseNumberOption('--top-k', options.topK) ?? services.config.retrieval.topK;
        const alpha = parseNumberOption('--alpha', options.alpha);

        const result = await retriever.retrieveDetailed(query, options.mode, k, { alpha });

        console.log(colors.bold(`Query: ${query}`));
        console.log(colors.gray(`Mode: ${result.mode}\n`));
        console.log(retriever.formatResults(result.hits));

        for (const failure of result.failures) {
          console.error(colors.yellow(`Warning: ${failure.channel} search failed: ${failure.error.message}`));
        }

        if (options.context) {
          console.log(colors.bold('\nContext:\n'));
          console.log(retriever.buildContext(query, result.hits));
        }
      });
    });

  program
    .command('shell')
    .alias('repl')
    .description('Start an interactive query session')
    .action(async () => {
      await run(async (services) => {
        const shell = new RagShell({
          retriever: createRetriever(services),
          defaultK: services.config.retrieval.topK,
        });
        await shell.start();
      });
    });

  program
    .command('count')
    .description('Show the number of chunks in the index')
    .action(async () => {
      await run(async ({ config, backend }) => {
        const count = await backend.count();
        console.log(`Chunks in index '${config.index.name}': ${count}`);
      });
    });

  program
    .command('info')
    .description('Show cluster and index information')
    .action(async () => {
      await run(async ({ config, backend }) => {
        const cluster = await backend.info();
        console.log(`Cluster: ${cluster.clusterName}`);
        console.log(`Version: ${cluster.version}`);
        console.log(`Endpoint: ${opensearchUrl(config.opensearch)}`);

        if (await backend.indexExists()) {
          const index = await backend.getIndexInfo();
          console.log(`Index: ${config.index.name} (${index.count} chunks)`);
        } else {
          console.log(colors.yellow(`Index '${config.index.name}' does not exist. Run create-index first.`));
        }
      });
    });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  console.error(colors.red(`Fatal: ${describeError(error)}`));
  process.exit(1);
});
