import { z } from 'zod';

export const GAME_STATES = ['LOGIN_SCREEN', 'LOGGING_IN', 'LOADING', 'LOGGED_IN', 'CONNECTION_LOST', 'HOPPING'] as const;
export type GameState = (typeof GAME_STATES)[number];

export const helloMessageSchema = z.object({
  type: z.literal('hello'),
  client: z.string().min(1),
  version: z.string(),
  ts: z.number()
});

export const gameTickMessageSchema = z.object({
  type: z.literal('game_tick'),
  ts: z.number()
});

export const gameStateMessageSchema = z.object({
  type: z.literal('game_state'),
  state: z.enum(GAME_STATES),
  ts: z.number()
});

export const adapterMessageSchema = z.discriminatedUnion('type', [helloMessageSchema, gameTickMessageSchema, gameStateMessageSchema]);

export type HelloMessage = z.infer<typeof helloMessageSchema>;
export type GameTickMessage = z.infer<typeof gameTickMessageSchema>;
export type GameStateMessage = z.infer<typeof gameStateMessageSchema>;
export type AdapterMessage = z.infer<typeof adapterMessageSchema>;
export type AdapterEventType = AdapterMessage['type'];
