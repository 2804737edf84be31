import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { PersonalityStore } from '../store/personalityStore';
import { badRequest, sendError, toNumber } from './reply';

// ---------- Schemas ----------
const telegramId = z.preprocess(toNumber, z.number().int());

const listQuerySchema = z.object({
  telegram_id: telegramId,
});

const createSchema = z.object({
  telegram_id: telegramId,
  name: z.string().trim().min(1, 'name required').max(255),
  description: z.string().optional(),
  prompt_template: z.string().min(1, 'prompt_template required'),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().max(1000).optional(),
  is_default: z.boolean().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
});

const deleteSchema = z.object({
  telegram_id: telegramId,
  name: z.string().min(1, 'name required'),
});

// ---------- Routes ----------
export async function registerPersonalityRoutes(app: FastifyInstance, store: PersonalityStore) {
  // List (creates the user with its seeded default on first sight)
  app.get('/api/personalities', async (req, reply) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      await store.getOrCreateUser(parsed.data.telegram_id);
      const personalities = await store.listPersonalities(parsed.data.telegram_id);
      return reply.send({ telegram_id: parsed.data.telegram_id, personalities });
    } catch (err) {
      return sendError(req, reply, err);
    }
  });

  // Create
  app.post('/api/personality', async (req, reply) => {
    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { telegram_id, username, first_name, ...args } = parsed.data;
    try {
      await store.getOrCreateUser(telegram_id, { username, first_name });
      const personality = await store.createPersonality(telegram_id, args);
      return reply.code(201).send({ personality });
    } catch (err) {
      return sendError(req, reply, err);
    }
  });

  // Delete
  app.post('/api/personality/delete', async (req, reply) => {
    const parsed = deleteSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    try {
      await store.deletePersonality(parsed.data.telegram_id, parsed.data.name);
      return reply.send({ ok: true });
    } catch (err) {
      return sendError(req, reply, err);
    }
  });
}
