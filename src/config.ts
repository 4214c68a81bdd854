import { z } from 'zod'

import { ApnsClientOptions } from './ApnsClient.types'

const EnvironmentSchema = z
  .object({
    APNS_KEY_ID: z.string().min(1).optional(),
    APNS_TEAM_ID: z.string().min(1).optional(),
    APNS_KEY: z.string().min(1).optional(),
    APNS_KEY_LOCATION: z.string().min(1).optional(),
    APNS_TOPIC: z.string().min(1).optional(),
    APNS_ENVIRONMENT: z.enum(['development', 'production']).optional(),
    APNS_ENDPOINT: z.string().url().optional()
  })
  .superRefine((environment, context) => {
    const hasKey = !!(environment.APNS_KEY || environment.APNS_KEY_LOCATION)
    const parts = [environment.APNS_KEY_ID, environment.APNS_TEAM_ID, hasKey || undefined]
    const given = parts.filter((part) => part !== undefined).length

    if (given > 0 && given < parts.length) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: 'APNS_KEY_ID, APNS_TEAM_ID and APNS_KEY or APNS_KEY_LOCATION must be set together' })
    }
  })

/** Builds client options from `APNS_*` environment variables. */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): ApnsClientOptions {
  const environment = EnvironmentSchema.parse(env)
  const options: ApnsClientOptions = {}

  if (environment.APNS_KEY_ID && environment.APNS_TEAM_ID) {
    options.token = { keyId: environment.APNS_KEY_ID, teamId: environment.APNS_TEAM_ID, key: environment.APNS_KEY, keyLocation: environment.APNS_KEY_LOCATION }
  }

  if (environment.APNS_TOPIC) options.topic = environment.APNS_TOPIC
  if (environment.APNS_ENVIRONMENT) options.sandbox = environment.APNS_ENVIRONMENT === 'development'
  if (environment.APNS_ENDPOINT) options.endpoint = environment.APNS_ENDPOINT

  return options
}
