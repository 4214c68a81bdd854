import { z } from 'zod'

import { Alert, AlertDictionary, AlertWire, Sound, SoundDictionary, SoundWire } from './Notification.types'
import { CodecError } from './errors'

export const DEFAULT_SOUND: Readonly<Sound> = Object.freeze({ critical: false, name: 'default', volume: 1 })

const AlertDictionarySchema = z
  .object({
    title: z.string().optional(),
    subtitle: z.string().optional(),
    body: z.string().optional(),
    'launch-image': z.string().optional(),
    'title-loc-key': z.string().optional(),
    'title-loc-args': z.array(z.string()).optional(),
    'subtitle-loc-key': z.string().optional(),
    'subtitle-loc-args': z.array(z.string()).optional(),
    'loc-key': z.string().optional(),
    'loc-args': z.array(z.string()).optional()
  })
  .strict()

const SoundDictionarySchema = z
  .object({
    critical: z.number().int(),
    name: z.string(),
    volume: z.number()
  })
  .strict()

export function createSound(sound: Partial<Sound> = {}): Sound {
  return { ...DEFAULT_SOUND, ...sound }
}

/** True when the alert is sent as its bare body string. */
export function isBareAlert(alert: Alert): boolean {
  return (
    alert.body !== undefined &&
    alert.title === undefined &&
    alert.subtitle === undefined &&
    alert.launchImage === undefined &&
    alert.titleLocKey === undefined &&
    alert.titleLocArgs === undefined &&
    alert.subtitleLocKey === undefined &&
    alert.subtitleLocArgs === undefined &&
    alert.locKey === undefined &&
    alert.locArgs === undefined
  )
}

export function encodeAlert(alert: Alert): AlertWire {
  if (alert.body === undefined && alert.locKey === undefined) throw new CodecError('missing-field', 'alert', 'body')
  if (isBareAlert(alert) && alert.body !== undefined) return alert.body

  const dictionary: AlertDictionary = {}

  if (alert.titleLocKey !== undefined) {
    dictionary['title-loc-key'] = alert.titleLocKey
    if (alert.titleLocArgs !== undefined) dictionary['title-loc-args'] = [...alert.titleLocArgs]
  } else if (alert.title !== undefined) {
    dictionary.title = alert.title
  }

  if (alert.subtitleLocKey !== undefined) {
    dictionary['subtitle-loc-key'] = alert.subtitleLocKey
    if (alert.subtitleLocArgs !== undefined) dictionary['subtitle-loc-args'] = [...alert.subtitleLocArgs]
  } else if (alert.subtitle !== undefined) {
    dictionary.subtitle = alert.subtitle
  }

  if (alert.locKey !== undefined) {
    dictionary['loc-key'] = alert.locKey
    if (alert.locArgs !== undefined) dictionary['loc-args'] = [...alert.locArgs]
  } else if (alert.body !== undefined) {
    dictionary.body = alert.body
  }

  if (alert.launchImage !== undefined) dictionary['launch-image'] = alert.launchImage

  return dictionary
}

export function decodeAlert(wire: unknown): Alert {
  if (typeof wire === 'string') return { body: wire }

  const parsed = AlertDictionarySchema.safeParse(wire)

  if (!parsed.success) throw toCodecError('alert', parsed.error)

  const dictionary = parsed.data

  if (dictionary.body === undefined && dictionary['loc-key'] === undefined) throw new CodecError('missing-field', 'alert', 'body')

  const alert: Alert = {}

  if (dictionary.title !== undefined) alert.title = dictionary.title
  if (dictionary.subtitle !== undefined) alert.subtitle = dictionary.subtitle
  if (dictionary.body !== undefined) alert.body = dictionary.body
  if (dictionary['launch-image'] !== undefined) alert.launchImage = dictionary['launch-image']
  if (dictionary['title-loc-key'] !== undefined) alert.titleLocKey = dictionary['title-loc-key']
  if (dictionary['title-loc-args'] !== undefined) alert.titleLocArgs = dictionary['title-loc-args']
  if (dictionary['subtitle-loc-key'] !== undefined) alert.subtitleLocKey = dictionary['subtitle-loc-key']
  if (dictionary['subtitle-loc-args'] !== undefined) alert.subtitleLocArgs = dictionary['subtitle-loc-args']
  if (dictionary['loc-key'] !== undefined) alert.locKey = dictionary['loc-key']
  if (dictionary['loc-args'] !== undefined) alert.locArgs = dictionary['loc-args']

  return alert
}

/**
 * Non-critical sounds travel as their name alone. Critical ones carry the
 * integer flag and a volume clamped to [0, 1].
 */
export function encodeSound(sound: Sound): SoundWire {
  if (!sound.critical) return sound.name

  const dictionary: SoundDictionary = { critical: 1, name: sound.name, volume: Math.min(Math.max(sound.volume, 0), 1) }

  return dictionary
}

export function decodeSound(wire: unknown): Sound {
  if (typeof wire === 'string') return { critical: false, name: wire, volume: 0 }

  const parsed = SoundDictionarySchema.safeParse(wire)

  if (!parsed.success) throw toCodecError('sound', parsed.error)

  return { critical: parsed.data.critical !== 0, name: parsed.data.name, volume: parsed.data.volume }
}

function toCodecError(subject: string, error: z.ZodError): CodecError {
  const issue = error.issues[0]

  if (!issue) return new CodecError('invalid-type', subject)

  if (issue.code === 'unrecognized_keys') return new CodecError('unknown-field', subject, issue.keys[0])

  const field = issue.path.length > 0 ? issue.path.map(String).join('.') : undefined

  if (issue.code === 'invalid_type' && issue.received === 'undefined' && field !== undefined) return new CodecError('missing-field', subject, field)

  return new CodecError('invalid-type', subject, field)
}
