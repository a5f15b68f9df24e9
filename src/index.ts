#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { buildVerdictReport, formatVerdictReport } from './analysis/verdictReport.js';
import { classifyFiles } from './commands/classify.js';
import { loadConfig } from './config.js';
import { readVerdictCsv } from './csv/reader.js';
import { readSinglePost } from './input/postRecords.js';
import { MoralReasoner } from './reasoning/moralReasoner.js';
import { decideVerdict, LABELING_POLICIES } from './reasoning/verdictClassifier.js';
import type { VerdictExplanation } from './types/index.js';
import { parsePositiveInteger } from './utils/options.js';
import { displayTitle } from './utils/text.js';

dotenv.config();

const program = new Command();
program
  .name('verdict-reasoner')
  .description('Infer dispute-post verdicts from per-comment vectors via weighted constraint optimization.');

program
  .command('classify')
  .description('Classify every post of a JSONL vector file and write one CSV row per post.')
  .requiredOption('--vectors <path>', 'JSONL file with one post (and its processed comments) per line.')
  .requiredOption('--ground-truth <path>', 'JSON array of { post_id, ground_truth_label } entries.')
  .option('-o, --output <path>', 'CSV file to write.', 'verdicts.csv')
  .option('--policy <name>', `Labeling policy (${LABELING_POLICIES.join(' | ')}).`)
  .option('--concurrency <number>', 'Posts classified concurrently (default 8).')
  .action(async (rawOptions: ClassifyCommandOptions) => {
    await handleClassify(rawOptions);
  });

program
  .command('explain')
  .description('Show the resolved propositions and verdict for a single post JSON file.')
  .requiredOption('-i, --input <path>', 'JSON file holding one post object (or an array whose first item is used).')
  .option('--policy <name>', `Labeling policy (${LABELING_POLICIES.join(' | ')}).`)
  .action(async (rawOptions: ExplainCommandOptions) => {
    await handleExplain(rawOptions);
  });

program
  .command('report')
  .description('Compare verdicts in a CSV produced by "classify" against their ground-truth labels.')
  .requiredOption('-i, --input <path>', 'Verdict CSV to analyze.')
  .option('--top <number>', 'How many verdict transitions to list (default 8).')
  .action(async (rawOptions: ReportCommandOptions) => {
    await handleReport(rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

interface ClassifyCommandOptions {
  vectors: string;
  groundTruth: string;
  output: string;
  policy?: string;
  concurrency?: string;
}

interface ExplainCommandOptions {
  input: string;
  policy?: string;
}

interface ReportCommandOptions {
  input: string;
  top?: string;
}

async function handleClassify(rawOptions: ClassifyCommandOptions) {
  const config = loadConfig({ policy: rawOptions.policy, concurrency: rawOptions.concurrency });
  const vectorsPath = path.resolve(rawOptions.vectors);
  const groundTruthPath = path.resolve(rawOptions.groundTruth);
  const outputPath = path.resolve(rawOptions.output);

  console.log(`Vectors Source:      ${vectorsPath}`);
  console.log(`Ground Truth Source: ${groundTruthPath}`);
  console.log(`Output Target:       ${outputPath}`);
  console.log(`Labeling Policy:     ${config.labelingPolicy}\n`);

  const result = await classifyFiles({
    vectorsPath,
    groundTruthPath,
    outputPath,
    labelingPolicy: config.labelingPolicy,
    concurrency: config.concurrency,
    logger: createLogger('classify'),
  });

  console.log('-'.repeat(40));
  console.log(`Processed ${result.processed} posts (${result.skipped} skipped).`);
  console.log(`Final results saved to ${result.outputPath}`);
}

async function handleExplain(rawOptions: ExplainCommandOptions) {
  const config = loadConfig({ policy: rawOptions.policy });
  const inputPath = path.resolve(rawOptions.input);
  const { post, groundTruth } = await readSinglePost(inputPath);
  const reasoner = new MoralReasoner({ labelingPolicy: config.labelingPolicy, logger: createLogger('reasoner') });
  const explanation = reasoner.explain(post);

  const rule = '='.repeat(50);
  console.log(rule);
  console.log(`Post ID: ${post.id}`);
  console.log(`Title:   ${displayTitle(post.title)}`);
  console.log('-'.repeat(50));
  for (const line of describeExplanation(explanation)) {
    console.log(line);
  }
  console.log('-'.repeat(50));
  console.log(`Ground Truth Label:  ${groundTruth}`);
  console.log(`Verdict (${explanation.policy}):        ${explanation.verdict}`);
  console.log(rule);
}

async function handleReport(rawOptions: ReportCommandOptions) {
  const top = parsePositiveInteger(rawOptions.top, 8, 'top');
  const rows = await readVerdictCsv(path.resolve(rawOptions.input));
  console.log(formatVerdictReport(buildVerdictReport(rows, top)));
}

function describeExplanation(explanation: VerdictExplanation): string[] {
  const { assignment } = explanation;
  if (!assignment) {
    return [`Comments: ${explanation.commentCount}`, `No assignment resolved (${explanation.verdict}).`];
  }

  const { harm, intent, empathy, apology } = assignment;
  const byPolicy = LABELING_POLICIES.map((policy) => `${policy}=${decideVerdict(assignment, policy)}`);
  return [
    `Comments: ${explanation.commentCount} (${explanation.clauses.length} soft clauses)`,
    `Assignment: Harm=${harm}, Intent=${intent}, Empathy=${empathy}, Apology=${apology}`,
    `Satisfied weight: ${explanation.satisfiedWeight} of ${explanation.totalWeight}`,
    `Tied assignments: ${explanation.tiedAssignments}`,
    `Verdict by policy: ${byPolicy.join(', ')}`,
  ];
}

function createLogger(scope: string) {
  return (message: string) => console.log(`[${scope}] ${message}`);
}
