#!/usr/bin/env node
/**
 * Run the post pipeline once from the command line and print the result.
 *
 * Usage:
 *   npm run generate -- --listing <url> [--site <url>] [--json]
 *   npm run generate -- --resume <session_id>
 *
 * Options:
 *   --listing <url>   Listing page to scrape (required unless --resume)
 *   --site <url>      Hotel website used for enrichment
 *   --resume <id>     Re-run the missing stages of a stored session
 *   --json            Print the raw result as JSON
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Posts generated
 *   1 - The pipeline failed
 *   2 - Invalid arguments or configuration
 */

import { parseArgs } from 'node:util';
import { createPipelineOrchestrator } from './agents/pipeline.js';
import type { GenerateResult, Post } from './agents/types.js';
import { loadConfig } from './lib/config.js';
import { PipelineError, errorMessage, toPublicError } from './lib/errors.js';
import { createLLMProvider } from './lib/llm.js';
import logger from './lib/logger.js';
import { selectSessionStore } from './sessions/index.js';
import { createDefaultTools } from './tools/index.js';

const HELP = `Usage: generate --listing <url> [--site <url>] [--json]
       generate --resume <session_id> [--json]`;

function formatPosts(posts: readonly Post[]): string {
  return posts
    .map((post, i) => [
      `#${i + 1} ${post.image_url}`,
      `   ${post.caption}`,
      `   ${post.hashtags.join(' ')}`,
    ].join('\n'))
    .join('\n\n');
}

function parseCliArgs() {
  return parseArgs({
    options: {
      listing: { type: 'string' },
      site: { type: 'string' },
      resume: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  }).values;
}

function buildRuntime() {
  const config = loadConfig();
  const store = selectSessionStore(config.session, logger);
  const orchestrator = createPipelineOrchestrator(config, store, createDefaultTools(createLLMProvider(), logger));
  return { store, orchestrator };
}

async function main(): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs();
  } catch (err) {
    console.error(errorMessage(err));
    console.error(HELP);
    return 2;
  }

  if (values.help) {
    console.log(HELP);
    return 0;
  }
  if (!values.listing && !values.resume) {
    console.error('Either --listing or --resume is required');
    console.error(HELP);
    return 2;
  }

  let runtime: ReturnType<typeof buildRuntime>;
  try {
    runtime = buildRuntime();
  } catch (err) {
    console.error(`Configuration error: ${errorMessage(err)}`);
    return 2;
  }
  const { store, orchestrator } = runtime;

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  let result: GenerateResult;
  if (values.resume) {
    const sessionId = values.resume;
    try {
      const posts = await orchestrator.resume(sessionId, { signal: controller.signal });
      result = { status: 'success', session_id: sessionId, posts };
    } catch (err) {
      result = { status: 'error', session_id: sessionId, error: toPublicError(PipelineError.from('session', err)) };
    }
  } else {
    result = await orchestrator.generate(values.listing ?? '', values.site ?? null, { signal: controller.signal });
  }
  await store.close();

  if (values.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.status === 'success') {
    console.log(`Session ${result.session_id}\n`);
    console.log(formatPosts(result.posts));
  } else {
    console.error(`Failed at ${result.error.stage} (${result.error.category}): ${result.error.message}`);
    if (result.session_id) console.error(`Session ${result.session_id} keeps the partial state.`);
  }
  return result.status === 'success' ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'CLI crashed');
    process.exitCode = 1;
  });
