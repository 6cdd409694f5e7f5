import process from 'process';
import { z } from 'zod';
import { parseEnv } from './validate';

const required = (name: string) => z.string().trim().min(1, `${name} must not be empty`);

const coordinate = (name: string) =>
  required(name).refine((value) => Number.isFinite(Number(value)), `${name} must be numeric`);

const notifierSchema = z.object({
  OPENWEATHER_API_KEY: required('OPENWEATHER_API_KEY'),
  DISCORD_WEBHOOK: required('DISCORD_WEBHOOK').url('DISCORD_WEBHOOK must be a valid URL'),
  LATITUDE: coordinate('LATITUDE'),
  LONGITUDE: coordinate('LONGITUDE'),
  CITY_NAME: z.string().trim().min(1).default('DefaultCity'),
  // Mention prefixed to every notification, e.g. a Discord role tag
  TAG_ID: z.string().trim().optional(),
});

export type NotifierConfig = z.infer<typeof notifierSchema>;

export function getNotifierConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  return parseEnv(notifierSchema, env, 'notifier');
}
