import { z } from "zod"
import type { ConfigDocument } from "../document/config-document"
import { isJsonArray, isJsonObject } from "../json/json-value"

export const VOICES_KEY = "voices"

export const voiceSchema = z.object({
  lang: z.string(),
  name: z.string(),
  voiceUri: z.string(),
  isDefault: z.boolean(),
  isLocalService: z.boolean(),
})

export type Voice = z.infer<typeof voiceSchema>

/**
 * Speech voices listed under `voices`. Entries that are not objects or miss
 * a field of the right kind are skipped; order is kept.
 */
export function getVoices(doc: ConfigDocument): Voice[] | undefined {
  const value = doc.get(VOICES_KEY)
  if (!isJsonArray(value)) return undefined

  const voices: Voice[] = []

  for (const item of value) {
    if (!isJsonObject(item)) continue

    const parsed = voiceSchema.safeParse(Object.fromEntries(item))
    if (parsed.success) voices.push(parsed.data)
  }

  return voices
}
