/**
 * Generator configuration.
 *
 * Input is validated with zod before the generator touches the store; an
 * invalid configuration throws `ConfigError` listing every problem found.
 *
 * Usage:
 *   const config = parseGeneratorConfig({ strategy: 'sampling', users: 200, messages: 25000 })
 *   const fixture = parseGeneratorConfig({ strategy: 'fixture' })
 */

import { z } from 'zod'
import { getPreset, getPresetNames } from '../datasets/chat/presets'

// Fixed anchor so fixture datasets are identical wherever they are generated
export const DEFAULT_FIXTURE_ANCHOR = '2024-06-03T12:00:00.000Z'

export const MAX_BATCH_SIZE = 5000

export class ConfigError extends Error {
  readonly name = 'ConfigError'

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
  }
}

function currentHour(): string {
  const now = new Date()
  now.setUTCMinutes(0, 0, 0)
  return now.toISOString()
}

const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).default(200),
    maxDelayMs: z.number().int().min(0).default(5000),
    jitterMs: z.number().int().min(0).default(100),
  })
  .default({})

const activitySchema = z
  .object({
    businessHours: z
      .object({
        start: z.number().int().min(0).max(23).default(9),
        end: z.number().int().min(1).max(24).default(18),
      })
      .default({}),
    businessHourWeight: z.number().positive().default(4),
    weekendWeight: z.number().positive().default(0.4),
  })
  .default({})

const common = {
  batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE).default(1000),
  retry: retrySchema,
  /** Per store round-trip; 0 disables the client-side bound */
  roundTripTimeoutMs: z.number().int().min(0).default(30000),
  idMode: z.enum(['hashed', 'seeded']).optional(),
  /** Plain-text password every generated account hashes */
  password: z.string().min(1).default('password123'),
}

const fixtureSchema = z.object({
  strategy: z.literal('fixture'),
  ...common,
  anchor: z.string().datetime({ offset: true }).default(DEFAULT_FIXTURE_ANCHOR),
  /** Directory holding users.json and conversations.json */
  fixtureDir: z.string().optional(),
})

const samplingSchema = z.object({
  strategy: z.literal('sampling'),
  ...common,
  anchor: z.string().datetime({ offset: true }).default(currentHour),
  seed: z.number().int().nonnegative().optional(),
  users: z.number().int().min(2).default(200),
  directChats: z.number().int().min(0).default(300),
  groupChats: z.number().int().min(0).default(75),
  groupSize: z
    .object({
      min: z.number().int().min(2, 'group chats need at least 2 members').default(3),
      max: z.number().int().min(2).default(15),
    })
    .default({}),
  messages: z.number().int().min(0).default(25000),
  historyDays: z.number().int().min(1).max(3650).default(120),
  activeUserRatio: z.number().gt(0).max(1).default(0.7),
  adminPromotionChance: z.number().min(0).max(1).default(0.1),
  activity: activitySchema,
})

export const generatorConfigSchema = z
  .discriminatedUnion('strategy', [fixtureSchema, samplingSchema])
  .superRefine((config, ctx) => {
    if (config.strategy !== 'sampling') return

    const maxPairs = (config.users * (config.users - 1)) / 2
    if (config.directChats > maxPairs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['directChats'],
        message: `${config.directChats} direct chats requested but ${config.users} users only form ${maxPairs} pairs`,
      })
    }
    if (config.groupSize.min > config.groupSize.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['groupSize'],
        message: `min (${config.groupSize.min}) is greater than max (${config.groupSize.max})`,
      })
    }
    if (config.groupChats > 0 && config.groupSize.min > config.users) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['groupSize', 'min'],
        message: `groups of ${config.groupSize.min} need more than ${config.users} users`,
      })
    }
    if (config.messages > 0 && config.directChats + config.groupChats === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['messages'],
        message: 'messages requested but no chats to put them in',
      })
    }
    const { start, end } = config.activity.businessHours
    if (start >= end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['activity', 'businessHours'],
        message: `start (${start}) must be before end (${end})`,
      })
    }
  })

export type GeneratorConfigInput = z.input<typeof generatorConfigSchema>
export type GeneratorConfig = z.output<typeof generatorConfigSchema>
export type FixtureConfig = Extract<GeneratorConfig, { strategy: 'fixture' }>
export type SamplingConfig = Extract<GeneratorConfig, { strategy: 'sampling' }>

export function parseGeneratorConfig(input: unknown): GeneratorConfig {
  const result = generatorConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    )
  }
  return result.data
}

/**
 * Sampling configuration from a named preset, with overrides applied on top.
 */
export function presetConfig(
  name: string,
  overrides: Partial<Extract<GeneratorConfigInput, { strategy: 'sampling' }>> = {}
): SamplingConfig {
  const preset = getPreset(name)
  if (!preset) {
    throw new ConfigError([`preset: unknown preset "${name}" (available: ${getPresetNames().join(', ')})`])
  }

  const config = parseGeneratorConfig({
    users: preset.users,
    directChats: preset.directChats,
    groupChats: preset.groupChats,
    messages: preset.messages,
    ...overrides,
    strategy: 'sampling',
  })
  if (config.strategy !== 'sampling') throw new ConfigError(['strategy: expected sampling'])
  return config
}
