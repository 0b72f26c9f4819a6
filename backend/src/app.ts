import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { AppError, ValidationError } from './errors';
import { createLogger } from './logger';
import type { FlowController } from './session/flowController';
import type { SessionSnapshot } from './session/session';

const log = createLogger('api');

const modeBody = z.object({ mode: z.enum(['placesApi', 'businessProfile']) });
const placeBody = z.object({ placeId: z.string() });
const selectionBody = z.object({
  account: z.string().min(1),
  location: z.string().min(1).optional(),
});
const extraTextBody = z.object({ extraText: z.string() });
const draftBody = z
  .object({
    replyText: z.string().optional(),
    post: z.boolean().optional(),
  })
  .refine((b) => b.replyText !== undefined || b.post !== undefined, {
    message: 'Provide replyText or post.',
  });
const indexParam = z.coerce.number().int().min(0);

function parse<T>(schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue?.message ?? 'Invalid request.'}`);
  }
  return parsed.data;
}

type Action = (req: Request) => SessionSnapshot | Promise<SessionSnapshot>;

function handle(name: string, action: Action) {
  return async (req: Request, res: Response) => {
    try {
      const snapshot = await action(req);
      return res.json(snapshot);
    } catch (err) {
      log.error(`${name} failed:`, err);
      if (err instanceof AppError) {
        return res
          .status(err.status)
          .json({ error: err.code, message: err.message });
      }
      return res.status(500).json({
        error: 'UNEXPECTED_ERROR',
        message: err instanceof Error ? err.message : 'Unknown error.',
      });
    }
  };
}

export function createApp(flow: FlowController) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get(
    '/api/session',
    handle('session', () => flow.snapshot()),
  );

  app.post(
    '/api/mode',
    handle('select mode', (req) =>
      flow.selectMode(parse(modeBody, req.body).mode),
    ),
  );

  app.post(
    '/api/places/reviews',
    handle('fetch places reviews', (req) =>
      flow.fetchPlaceReviews(parse(placeBody, req.body).placeId),
    ),
  );

  app.post(
    '/api/business/connect',
    handle('connect', () => flow.connect()),
  );

  app.put(
    '/api/business/selection',
    handle('select location', (req) => {
      const { account, location } = parse(selectionBody, req.body);
      return flow.selectLocation(account, location);
    }),
  );

  app.post(
    '/api/business/reviews',
    handle('fetch location reviews', () => flow.fetchLocationReviews()),
  );

  app.put(
    '/api/drafts/extra',
    handle('set extra text', (req) =>
      flow.setExtraText(parse(extraTextBody, req.body).extraText),
    ),
  );

  app.patch(
    '/api/drafts/:index',
    handle('edit reply', (req) =>
      flow.updateDraft(
        parse(indexParam, req.params.index),
        parse(draftBody, req.body),
      ),
    ),
  );

  app.post(
    '/api/replies',
    handle('post replies', () => flow.postSelected()),
  );

  return app;
}
