import type { ValueSource } from "../../ports/value-source"

export type ChunkedText = {
  text: string
  /** Variables that contributed text, in concatenation order. */
  variables: string[]
}

/**
 * Read `NAME_1`, `NAME_2`, ... until the first absent index and concatenate
 * them. When that yields nothing, fall back to `NAME`.
 */
export function readChunkedText(source: ValueSource, variable: string): ChunkedText {
  let text = ""
  const variables: string[] = []

  for (let index = 1; ; index++) {
    const name = `${variable}_${index}`
    const chunk = source.read(name)
    if (chunk === undefined) break

    text += chunk
    variables.push(name)
  }

  if (text) return { text, variables }

  const whole = source.read(variable)
  if (!whole) return { text: "", variables: [] }

  return { text: whole, variables: [variable] }
}
