#!/usr/bin/env tsx
// Run the bundled sample call through the call summarizer and print the run history
import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { createPipelineApp } from '../app.js';

const samplePath = fileURLToPath(new URL('../data/sample-call.txt', import.meta.url));

const app = await createPipelineApp();
try {
  const result = await app.calls.run({
    agent_name: 'Dana',
    customer_name: 'Jordan',
    channel: 'voice',
    audio_path: samplePath,
  });

  console.log(JSON.stringify(result, null, 2));

  const runs = await app.calls.getRuns(result.metadata.conversationId);
  console.log(`\nRuns recorded for ${result.metadata.conversationId}: ${runs.length}`);
} finally {
  await app.close();
}
