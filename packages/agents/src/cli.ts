#!/usr/bin/env node
// Pipelines CLI: finance questions and call summaries from the terminal
//
// Usage:
//   pipelines ask "What is the price of IBM?"                     # finance assistant
//   pipelines ask --conversation conv-123 "Explain index funds"   # continue a conversation
//   pipelines summarize --transcript-file call.txt                # call summarizer
//   pipelines summarize --audio recording.mp3 --agent-name Sam
//   pipelines agents                                              # list finance agents
//   pipelines chat                                                # interactive finance REPL
//   pipelines --help                                              # usage

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { createPipelineApp, type PipelineApp } from '../app.js';
import { listAgentProfiles } from '../config/agent-registry.js';
import type { CallResult } from '../types/call.js';
import type { FinanceResult } from '../types/finance.js';
import { InvalidRequestError } from '../utils/errors.js';
import { newConversationId } from '../orchestrator/pipeline.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── Argument parsing ────────────────────────────────────────────────

interface ParsedArgs {
  flags: Map<string, string>;
  switches: Set<string>;
  positional: string[];
}

const VALUE_FLAGS = new Set([
  '--conversation', '--transcript-file', '--audio', '--agent-name', '--customer-name', '--channel',
]);

function parseArgs(args: string[]): ParsedArgs {
  const flags = new Map<string, string>();
  const switches = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (VALUE_FLAGS.has(arg) && next !== undefined) {
      flags.set(arg, next);
      i++;
    } else if (arg.startsWith('--') || arg === '-h') {
      switches.add(arg);
    } else {
      positional.push(arg);
    }
  }
  return { flags, switches, positional };
}

// ── Rendering ───────────────────────────────────────────────────────

function printFinance(result: FinanceResult): void {
  console.log(`\n  ${c('magenta', `[${result.route?.agentName ?? 'Finance Q&A Agent'}]`)} ${c('dim', result.route?.reason ?? '')}\n`);
  console.log(result.answer);
  console.log(`\n  ${c('dim', `Conversation: ${result.metadata.conversationId}`)}\n`);
}

function printCall(result: CallResult): void {
  const { metadata, transcript, summary, quality } = result;
  console.log(`\n  ${c('bold', 'Call summary')} ${c('dim', `— ${metadata.agentName} / ${metadata.customerName} (${metadata.channel})`)}\n`);
  console.log(summary.summary);

  if (summary.keyPoints.length > 0) {
    console.log(`\n  ${c('bold', 'Key points')}`);
    for (const point of summary.keyPoints) console.log(`    ${c('dim', '●')} ${point}`);
  }
  if (summary.followUps.length > 0) {
    console.log(`\n  ${c('bold', 'Follow-ups')}`);
    for (const item of summary.followUps) console.log(`    ${c('dim', '●')} ${item}`);
  }

  console.log(`\n  ${c('bold', 'Quality')} ${c('dim', `(${quality.method})`)}`);
  console.log(`    professionalism ${quality.professionalism} | empathy ${quality.empathy} | resolution ${quality.resolution} | compliance ${quality.compliance}`);
  console.log(`    ${c('green', `overall ${quality.overall}/5`)}`);
  if (quality.risks.length > 0) {
    console.log(`    ${c('yellow', `risks: ${quality.risks.join(', ')}`)}`);
  }
  console.log(`    ${c('dim', quality.summaryFeedback)}`);
  console.log(`\n  ${c('dim', `Transcript source: ${transcript.source} | Conversation: ${metadata.conversationId}`)}\n`);
}

// ── CLI class ───────────────────────────────────────────────────────

class PipelinesCli {
  private app: PipelineApp | null = null;

  private async getApp(): Promise<PipelineApp> {
    if (!this.app) this.app = await createPipelineApp();
    return this.app;
  }

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const args = parseArgs(rawArgs.slice(1));

    try {
      switch (command) {
        case 'ask':
          await this.handleAsk(args);
          break;
        case 'summarize':
          await this.handleSummarize(args);
          break;
        case 'agents':
          this.listAgents();
          break;
        case 'chat':
          await this.startRepl(args.flags.get('--conversation'));
          break;
        case 'help':
          this.printHelp();
          break;
        default:
          console.error(`Unknown command: ${command}\n`);
          this.printHelp();
          process.exitCode = 1;
      }
    } finally {
      await this.app?.close();
    }
  }

  // ── Subcommand: ask ─────────────────────────────────────────────

  private async handleAsk(args: ParsedArgs): Promise<void> {
    const query = args.positional.join(' ').trim();
    if (!query) {
      console.error('Error: No query provided. Use "pipelines --help" for usage.\n');
      process.exitCode = 1;
      return;
    }

    const app = await this.getApp();
    const result = await app.finance.run({
      query,
      conversation_id: args.flags.get('--conversation'),
    });

    if (args.switches.has('--json')) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printFinance(result);
    }
  }

  // ── Subcommand: summarize ───────────────────────────────────────

  private async handleSummarize(args: ParsedArgs): Promise<void> {
    const transcriptFile = args.flags.get('--transcript-file');
    const transcript = transcriptFile ? readFileSync(transcriptFile, 'utf-8') : undefined;

    const app = await this.getApp();
    const startTime = Date.now();
    const result = await app.calls.run({
      conversation_id: args.flags.get('--conversation'),
      agent_name: args.flags.get('--agent-name') ?? 'Agent',
      customer_name: args.flags.get('--customer-name') ?? 'Customer',
      channel: args.flags.get('--channel') ?? 'voice',
      audio_path: args.flags.get('--audio'),
      transcript,
    });

    if (args.switches.has('--json')) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    printCall(result);
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${duration}s`)}\n`);
  }

  // ── Subcommand: agents ──────────────────────────────────────────

  listAgents(): void {
    const agents = listAgentProfiles();

    console.log(`\n  ${c('bold', `${agents.length} finance agents:`)}\n`);
    for (const agent of agents) {
      const padded = agent.name.padEnd(28, ' ');
      const keywords = agent.routingKeywords.length > 0
        ? agent.routingKeywords.join(', ')
        : 'ticker detection';
      console.log(`    ${c('cyan', padded)} ${c('dim', agent.description)}`);
      console.log(`    ${' '.repeat(28)} ${c('dim', `routes on: ${keywords}`)}`);
    }
    console.log();
  }

  // ── Interactive finance REPL ────────────────────────────────────

  private async startRepl(conversationId = newConversationId()): Promise<void> {
    const app = await this.getApp();

    console.log(`\n  ${c('bold', 'Finance assistant')} ${c('dim', `— conversation ${conversationId}`)}`);
    console.log(`  ${c('dim', 'Type a question, /history for past runs, or exit.')}\n`);

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${c('cyan', 'finance>')} `,
    });

    rl.on('SIGINT', () => rl.close());
    rl.prompt();

    for await (const line of rl) {
      const input = line.trim();

      if (input === 'exit' || input === 'quit') break;

      if (input === '/history') {
        const runs = await app.finance.getRuns(conversationId);
        for (const run of runs) {
          console.log(`    ${c('dim', run.at)} ${c('cyan', run.agentName)} ${run.query}`);
        }
        if (runs.length === 0) console.log(`    ${c('dim', 'No runs yet.')}`);
      } else if (input) {
        try {
          const result = await app.finance.run({ query: input, conversation_id: conversationId });
          printFinance(result);
        } catch (err) {
          console.error(`  ${c('red', 'Error:')} ${err instanceof Error ? err.message : String(err)}\n`);
        }
      }

      rl.prompt();
    }

    rl.close();
    console.log(`  ${c('dim', 'Goodbye.')}\n`);
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Pipelines')} — finance assistant and call summarizer

  ${c('bold', 'Usage:')}
    pipelines ask "<query>" [--conversation <id>] [--json]
    pipelines summarize (--transcript-file <path> | --audio <path>)
                        [--agent-name <name>] [--customer-name <name>]
                        [--channel <voice|chat|email>] [--conversation <id>] [--json]
    pipelines agents                List finance agents and their routing keywords
    pipelines chat [--conversation <id>]
                                    Interactive finance assistant on one conversation
    pipelines --help                Show this help

  ${c('bold', 'Examples:')}
    pipelines ask "What is the price of IBM?"
    pipelines ask "How should I think about portfolio rebalancing?"
    pipelines summarize --transcript-file packages/agents/data/sample-call.txt --agent-name Dana
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new PipelinesCli();
cli.start().catch((err: unknown) => {
  const label = err instanceof InvalidRequestError ? 'Invalid request:' : 'Fatal:';
  console.error(`${c('red', label)} ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
