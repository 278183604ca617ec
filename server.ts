import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import cors from 'cors';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { createAppContext, getSystemStatus, type AppContext } from './services/appContext';
import { loadSettingsFromEnv } from './services/config';
import { processCvFile } from './services/documentProcessor';
import { AssistantError, errorMessage, toHttpError, unwrap, ValidationError } from './services/errors';
import { InterviewPrepAgent } from './services/interviewPrepAgent';
import { JobApplicationAgent } from './services/jobApplicationAgent';
import { createManualJob, extractJobDescription } from './services/jobExtractor';
import { createLogger } from './services/logger';
import {
  applicationRequestSchema,
  interviewRequestSchema,
  jobSourceRequestSchema,
  manualJobSchema,
  splitList,
  userProfileSchema,
} from './services/schemas';
import type { ApplicationResult, StatusResponse } from './types';

const log = createLogger('Server');

const UPLOAD_DIR = path.join(os.tmpdir(), 'job-assistant-uploads');

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new ValidationError('Invalid request', details.join('; '));
  }
  return parsed.data;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises to the error middleware on its own. */
const route = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function createServer(ctx: AppContext): express.Express {
  const { settings, resolver } = ctx;
  const applicationAgent = new JobApplicationAgent(resolver);
  const interviewAgent = new InterviewPrepAgent(resolver);

  fs.mkdirSync(UPLOAD_DIR, { recursive: true });
  const upload = multer({
    dest: UPLOAD_DIR,
    limits: { fileSize: settings.maxFileSizeMb * 1024 * 1024 },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (settings.allowedFileTypes.includes(ext)) {
        cb(null, true);
      } else {
        cb(new ValidationError(`Unsupported file type: ${ext || file.mimetype}`, `Allowed: ${settings.allowedFileTypes.join(', ')}`));
      }
    },
  });

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/status', (_req, res) => {
    const body: StatusResponse = {
      system: getSystemStatus(settings),
      models: resolver.getModelStatus(),
    };
    res.json(body);
  });

  app.post(
    '/api/health',
    route(async (_req, res) => {
      res.json(await resolver.healthCheck());
    }),
  );

  app.post(
    '/api/profile',
    upload.single('cvFile'),
    route(async (req, res) => {
      const file = req.file;
      const fields: Record<string, unknown> = req.body ?? {};
      // An uploaded CV replaces the typed experience summary.
      let cvText = typeof fields.cvText === 'string' ? fields.cvText.trim() : '';
      const skills = typeof fields.skills === 'string' ? splitList(fields.skills) : [];

      if (file) {
        try {
          log.info({ file: file.originalname }, 'Extracting CV text');
          const extracted = await processCvFile(file.path, file.mimetype);
          cvText = extracted.cvText;
          skills.push(...extracted.skills);
        } finally {
          fs.rm(file.path, { force: true }, (err) => {
            if (err) log.warn({ err: err.message }, 'Failed to remove uploaded file');
          });
        }
      }

      const profile = parseBody(userProfileSchema, {
        name: fields.name,
        email: fields.email,
        phone: typeof fields.phone === 'string' && fields.phone.trim() ? fields.phone.trim() : undefined,
        cvText,
        skills: [...new Set(skills)],
      });
      res.json(profile);
    }),
  );

  app.post(
    '/api/job',
    route(async (req, res) => {
      const { source } = parseBody(jobSourceRequestSchema, req.body);
      res.json(await extractJobDescription(source, settings));
    }),
  );

  app.post('/api/job/manual', (req, res) => {
    res.json(createManualJob(parseBody(manualJobSchema, req.body)));
  });

  app.post(
    '/api/application',
    route(async (req, res) => {
      const { job, profile, preferences } = parseBody(applicationRequestSchema, req.body);
      unwrap(resolver.getHandle());

      const outcome = await applicationAgent.processApplication(job, profile, preferences);
      if (outcome.error !== undefined || outcome.analysis === undefined) {
        throw new AssistantError(outcome.error ?? 'Application processing failed');
      }
      const body: ApplicationResult = { analysis: outcome.analysis, documents: outcome.documents };
      res.json(body);
    }),
  );

  app.post(
    '/api/interview',
    route(async (req, res) => {
      const { job, profile } = parseBody(interviewRequestSchema, req.body);
      unwrap(resolver.getHandle());

      const outcome = await interviewAgent.prepareForInterview(job, profile);
      if (!outcome.interviewPrep) {
        throw new AssistantError(outcome.error ?? 'Interview preparation failed');
      }
      res.json(outcome.interviewPrep);
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message });
      return;
    }
    const { status, body } = toHttpError(err);
    if (status >= 500) log.error({ err: errorMessage(err) }, 'Request failed');
    res.status(status).json(body);
  });

  return app;
}

async function main(): Promise<void> {
  const ctx = createAppContext(loadSettingsFromEnv());

  const result = await ctx.resolver.initialize();
  if (!result.ok) {
    // The server still starts so the form can show the status and remediation.
    log.warn({ kind: result.error.kind, remediation: result.error.remediation }, result.error.message);
  }

  createServer(ctx).listen(ctx.settings.port, () => {
    log.info(`Server running on http://localhost:${ctx.settings.port}`);
  });
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    log.fatal({ err: errorMessage(err) }, 'Server failed to start');
    process.exit(1);
  });
}
