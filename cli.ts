#!/usr/bin/env tsx
import fs from 'fs/promises';
import { realpathSync } from 'fs';
import * as readline from 'readline/promises';
import { fileURLToPath } from 'url';
import { stdin as input, stdout as output } from 'process';
import type { z } from 'zod';
import { createAppContext, getSystemStatus, type AppContext } from './services/appContext';
import { loadSettingsFromEnv } from './services/config';
import { processCvFile } from './services/documentProcessor';
import {
  AssistantError,
  errorMessage,
  ModelUnavailableError,
  NetworkError,
  ValidationError,
  type ModelError,
} from './services/errors';
import { InterviewPrepAgent } from './services/interviewPrepAgent';
import { JobApplicationAgent } from './services/jobApplicationAgent';
import { createManualJob, extractJobDescription } from './services/jobExtractor';
import { setLogLevel } from './services/logger';
import {
  manualJobSchema,
  splitList,
  userPreferencesSchema,
  userProfileSchema,
  type JobDescription,
  type UserPreferences,
  type UserProfile,
} from './services/schemas';

const USAGE = `Usage: job-assistant <command> [options]

Commands:
  status                              Show configuration and model availability
  health                              Probe every configured model
  apply [--cv <file>] [--job <source>]
                                      Analyze a posting and write cover and motivation letters
  interview [--cv <file>] [--job <source>]
                                      Build interview preparation material

Options:
  --cv <file>      CV to read your skills and background from (PDF, DOCX, TXT, MD);
                   without it you are asked for them
  --job <source>   Job posting URL or a text file with the posting; without it you can
                   give a URL, paste the text or enter the details by hand
  --debug          Verbose logging
  --help           Show this help`;

/** The part of a readline interface the prompts use. */
export interface Prompter {
  question(query: string): Promise<string>;
  close(): void;
}

export interface CliDeps {
  createContext(): AppContext;
  openPrompter(): Prompter;
}

const defaultDeps: CliDeps = {
  createContext: () => createAppContext(loadSettingsFromEnv()),
  openPrompter: () => readline.createInterface({ input, output }),
};

export interface CliArgs {
  command: string | undefined;
  cv?: string;
  job?: string;
  debug: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: undefined, debug: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--debug':
        args.debug = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--cv':
      case '--job': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new AssistantError(`Missing value for ${arg}`);
        }
        if (arg === '--cv') args.cv = value;
        else args.job = value;
        i++;
        break;
      }
      default:
        if (arg?.startsWith('-')) throw new AssistantError(`Unknown option: ${arg}`);
        if (args.command === undefined) args.command = arg;
        else throw new AssistantError(`Unexpected argument: ${arg}`);
    }
  }
  return args;
}

/** Lines printed for an error: the message, then what to do about it when known. */
export function describeError(error: unknown): string[] {
  if (error instanceof ModelUnavailableError) {
    return [`Error: ${error.message}`, `  ${error.modelError.remediation}`];
  }
  if (error instanceof AssistantError && error.details) {
    return [`Error: ${error.message}`, `  ${error.details}`];
  }
  return [`Error: ${errorMessage(error)}`];
}

function heading(title: string): void {
  console.log(`\n== ${title} ==\n`);
}

function printList(items: string[]): void {
  for (const item of items) console.log(`  - ${item}`);
}

async function initializeModels(ctx: AppContext): Promise<void> {
  const result = await ctx.resolver.initialize();
  if (!result.ok) throw new ModelUnavailableError(result.error);
}

async function showStatus(ctx: AppContext): Promise<void> {
  const system = getSystemStatus(ctx.settings);
  heading(`${system.appName} ${system.appVersion}`);
  console.log(`Ollama URL:      ${system.ollamaUrl}`);
  console.log(`Primary model:   ${system.primaryModel}`);
  console.log(`Fallback models: ${system.fallbackModels.join(', ') || '(none)'}`);

  const result = await ctx.resolver.initialize();
  const status = ctx.resolver.getModelStatus();
  console.log(`Reachable:       ${status.reachable ? 'yes' : 'no'}`);
  console.log(`Installed:       ${status.installedModels.join(', ') || '(none)'}`);
  for (const [name, healthy] of Object.entries(status.modelHealth)) {
    console.log(`  ${healthy ? 'ok  ' : 'FAIL'} ${name}`);
  }
  if (!result.ok) printModelError(result.error);
}

function printModelError(error: ModelError): void {
  console.log(`\n${error.message}`);
  console.log(`  ${error.remediation}`);
}

async function runHealth(ctx: AppContext): Promise<boolean> {
  const init = await ctx.resolver.initialize();
  const summary = await ctx.resolver.healthCheck();

  heading('Model health');
  for (const [name, healthy] of Object.entries(summary.models)) {
    console.log(`  ${healthy ? 'ok  ' : 'FAIL'} ${name}`);
  }
  console.log(`\n${summary.healthyCount}/${summary.totalCount} models healthy`);
  // A model that was still loading at startup may have passed just now.
  const ready = ctx.resolver.state === 'ready';
  if (!init.ok && !ready) printModelError(init.error);
  return ready && summary.healthyCount > 0;
}

async function ask(rl: Prompter, question: string, fallback = ''): Promise<string> {
  const suffix = fallback ? ` [${fallback}]` : '';
  const answer = (await rl.question(`${question}${suffix}: `)).trim();
  return answer || fallback;
}

async function askRequired(rl: Prompter, question: string): Promise<string> {
  for (;;) {
    const answer = await ask(rl, question);
    if (answer) return answer;
  }
}

function parseAnswers<S extends z.ZodTypeAny>(schema: S, answers: unknown): z.output<S> {
  const parsed = schema.safeParse(answers);
  if (!parsed.success) {
    throw new ValidationError('Invalid answers', parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

async function collectProfile(rl: Prompter, cvPath: string | undefined): Promise<UserProfile> {
  if (cvPath !== undefined) {
    const extracted = await processCvFile(cvPath);
    console.log(`Read CV (${extracted.cvText.length} characters, ${extracted.skills.length} known skills)`);

    const name = await askRequired(rl, 'Your full name');
    const email = await ask(rl, 'Your email address', extracted.email);
    const phone = await ask(rl, 'Your phone number', extracted.phone);
    return parseAnswers(userProfileSchema, { ...extracted, name, email, phone: phone || undefined });
  }

  console.log('No CV given, so tell me about yourself.');
  const name = await askRequired(rl, 'Your full name');
  const email = await askRequired(rl, 'Your email address');
  const phone = await ask(rl, 'Your phone number');
  const skills = await ask(rl, 'Your key skills (comma-separated)');
  const summary = await ask(rl, 'Brief summary of your experience and background');
  return parseAnswers(userProfileSchema, {
    name,
    email,
    phone: phone || undefined,
    cvText: summary,
    skills: splitList(skills),
  });
}

/** Reads lines until two empty ones in a row. Single blank lines between paragraphs are kept. */
export async function readPastedPosting(rl: Prompter): Promise<string> {
  console.log('Paste the job description (finish with two empty lines):');
  const lines: string[] = [];
  let emptyRun = 0;
  while (emptyRun < 2) {
    const line = await rl.question('');
    emptyRun = line.trim() ? 0 : emptyRun + 1;
    lines.push(line);
  }
  return lines.join('\n').trim();
}

async function enterJobManually(rl: Prompter): Promise<JobDescription> {
  const fields = parseAnswers(manualJobSchema, {
    title: await askRequired(rl, 'Job title'),
    company: await askRequired(rl, 'Company name'),
    description: await askRequired(rl, 'Job description'),
    requirements: await ask(rl, 'Key requirements (comma-separated)'),
    skills: await ask(rl, 'Required skills (comma-separated)'),
    location: await ask(rl, 'Location'),
  });
  return createManualJob(fields);
}

async function fetchJob(ctx: AppContext, rl: Prompter, url: string): Promise<JobDescription> {
  try {
    return await extractJobDescription(url, ctx.settings);
  } catch (error) {
    if (!(error instanceof NetworkError)) throw error;
    for (const line of describeError(error)) console.log(line);
    console.log('Enter the job details by hand instead.');
    return enterJobManually(rl);
  }
}

type JobSourceKind = 'url' | 'text' | 'manual';

async function chooseJobSource(rl: Prompter): Promise<JobSourceKind> {
  for (;;) {
    const answer = (await ask(rl, 'How would you like to provide the job description? (url/text/manual)', 'text')).toLowerCase();
    if (answer === 'url' || answer === 'text' || answer === 'manual') return answer;
    console.log('Answer url, text or manual.');
  }
}

async function readJob(ctx: AppContext, rl: Prompter, source: string | undefined): Promise<JobDescription> {
  if (source !== undefined) {
    if (/^https?:\/\//i.test(source)) return fetchJob(ctx, rl, source);
    return extractJobDescription(await fs.readFile(source, 'utf-8'), ctx.settings);
  }

  switch (await chooseJobSource(rl)) {
    case 'url':
      return fetchJob(ctx, rl, await askRequired(rl, 'Job posting URL'));
    case 'text':
      return extractJobDescription(await readPastedPosting(rl), ctx.settings);
    case 'manual':
      return enterJobManually(rl);
  }
}

async function collectJob(ctx: AppContext, rl: Prompter, source: string | undefined): Promise<JobDescription> {
  const job = await readJob(ctx, rl, source);
  console.log(`Job: ${job.title} at ${job.company}`);
  return job;
}

async function collectPreferences(rl: Prompter, job: JobDescription): Promise<UserPreferences> {
  console.log(`\nTell me about your interest in the ${job.title} role at ${job.company}\n`);
  const interest = await ask(rl, 'Interest level (1-10)', '7');

  return parseAnswers(userPreferencesSchema, {
    jobInterestLevel: Number(interest),
    motivation: await askRequired(rl, 'What excites you most about this opportunity?'),
    relevantExperience: await askRequired(rl, 'What relevant experience do you bring?'),
    careerGoals: await askRequired(rl, 'How does this role fit with your career goals?'),
    companyKnowledge: await ask(rl, 'What do you know about the company?', 'Not much yet'),
    concerns: (await ask(rl, 'Any concerns or questions about the role?')) || undefined,
    additionalInfo: (await ask(rl, 'Anything else to mention?')) || undefined,
  });
}

async function runApply(ctx: AppContext, rl: Prompter, args: CliArgs): Promise<boolean> {
  await initializeModels(ctx);

  const profile = await collectProfile(rl, args.cv);
  const job = await collectJob(ctx, rl, args.job);
  const preferences = await collectPreferences(rl, job);

  console.log('\nGenerating your application materials...');
  const agent = new JobApplicationAgent(ctx.resolver);
  const result = await agent.processApplication(job, profile, preferences);
  if (result.error !== undefined) {
    console.error(result.error);
    return false;
  }

  heading('Job analysis');
  console.log(result.analysis);
  for (const document of result.documents) {
    heading(document.title);
    console.log(document.content);
  }
  return true;
}

async function runInterview(ctx: AppContext, rl: Prompter, args: CliArgs): Promise<boolean> {
  await initializeModels(ctx);

  const profile = await collectProfile(rl, args.cv);
  const job = await collectJob(ctx, rl, args.job);

  console.log('\nPreparing your interview materials...');
  const agent = new InterviewPrepAgent(ctx.resolver);
  const { interviewPrep, error } = await agent.prepareForInterview(job, profile);
  if (!interviewPrep) {
    console.error(error ?? 'No interview preparation materials generated');
    return false;
  }

  heading('Confidence checklist');
  printList(interviewPrep.confidenceChecklist);
  heading('Technical questions');
  printList(interviewPrep.technicalQuestions);
  heading('Behavioral questions');
  printList(interviewPrep.behavioralQuestions);
  heading('Questions to ask');
  printList(interviewPrep.questionsToAsk);
  heading('Preparation timeline');
  for (const [period, tasks] of Object.entries(interviewPrep.preparationTimeline)) {
    console.log(`  ${period}: ${tasks.join(', ')}`);
  }
  return true;
}

export async function run(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const args = parseArgs(argv);
  if (args.help || args.command === undefined) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  const ctx = deps.createContext();
  if (args.debug) setLogLevel('debug');

  switch (args.command) {
    case 'status':
      await showStatus(ctx);
      return 0;
    case 'health':
      return (await runHealth(ctx)) ? 0 : 1;
    case 'apply':
    case 'interview': {
      const rl = deps.openPrompter();
      try {
        const done = args.command === 'apply' ? await runApply(ctx, rl, args) : await runInterview(ctx, rl, args);
        return done ? 0 : 1;
      } finally {
        rl.close();
      }
    }
    default:
      throw new AssistantError(`Unknown command: ${args.command}`, 'Run with --help to list the commands.');
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // npm links the bin through a symlink
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      for (const line of describeError(error)) console.error(line);
      process.exitCode = 1;
    });
}
