import { Router } from 'express';
import { z } from 'zod';
import { logger } from '../lib/logger.js';
import { BookingSessionMachine, SessionInput, SessionReply } from '../services/booking-session.service.js';
import { asyncHandler } from './booking.route.js';

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').optional(),
  function: z.object({
    name: z.string(),
    arguments: z.union([
      z.record(z.unknown()),
      z.string().transform((raw, ctx): Record<string, unknown> => {
        try {
          return z.record(z.unknown()).parse(JSON.parse(raw));
        } catch {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'arguments must be a JSON object' });
          return z.NEVER;
        }
      }),
    ]),
  }),
});

const webhookSchema = z.object({
  message: z.object({
    type: z.string(),
    toolCalls: z.array(toolCallSchema).optional(),
    call: z.object({ id: z.string() }).passthrough().optional(),
  }),
});

const argsSchema = z.object({
  user_id: z.string().min(1).optional(),
  date: z.string().optional(),
  slot_start: z.string().optional(),
});

type ToolCall = z.infer<typeof toolCallSchema>;

export interface ToolCallResult {
  toolCallId: string;
  result: string;
}

type ToolOutcome = SessionReply | { error: string };

/**
 * Maps a chat tool call onto a session input. The conversation layer in
 * front of this webhook owns the wording; this only moves state.
 */
function toSessionInput(name: string, args: z.infer<typeof argsSchema>): SessionInput | string {
  switch (name) {
    case 'start_booking':
      return { type: 'start' };
    case 'choose_date':
      return args.date ? { type: 'date', date: args.date } : 'date is required';
    case 'choose_slot':
      return args.slot_start ? { type: 'slot', start: args.slot_start } : 'slot_start is required';
    case 'cancel_booking':
      return { type: 'cancel' };
    default:
      return `Unknown function: ${name}`;
  }
}

async function runToolCall(
  sessions: BookingSessionMachine,
  toolCall: ToolCall,
  callId: string | undefined
): Promise<ToolOutcome> {
  const parsed = argsSchema.safeParse(toolCall.function.arguments);
  if (!parsed.success) {
    return { error: 'Invalid arguments' };
  }
  const userId = parsed.data.user_id ?? callId;
  if (!userId) {
    return { error: 'user_id is required' };
  }
  const input = toSessionInput(toolCall.function.name, parsed.data);
  if (typeof input === 'string') {
    return { error: input };
  }
  return sessions.handle(userId, input);
}

/**
 * POST /api/chat/webhook
 *
 * Accepts `{ message: { type: "tool-calls", toolCalls, call? } }` and answers
 * `{ results: [{ toolCallId, result }] }`, `result` being the JSON session reply.
 * Tool calls of one message run in order.
 */
export function createChatRouter(sessions: BookingSessionMachine): Router {
  const router = Router();

  router.post(
    '/webhook',
    asyncHandler(async (req, res) => {
      const { message } = webhookSchema.parse(req.body);

      if (message.type !== 'tool-calls' || !message.toolCalls) {
        logger.debug(`Chat event: ${message.type}`);
        res.json({ status: 'ok' });
        return;
      }

      const results: ToolCallResult[] = [];
      for (const toolCall of message.toolCalls) {
        const outcome = await runToolCall(sessions, toolCall, message.call?.id);
        logger.debug(`Tool ${toolCall.function.name} result:`, outcome);
        results.push({ toolCallId: toolCall.id, result: JSON.stringify(outcome) });
      }
      res.json({ results });
    })
  );

  return router;
}
