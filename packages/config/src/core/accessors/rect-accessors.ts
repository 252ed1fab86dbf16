import type { Logger } from "@envdoc/logger"
import type { ConfigDocument } from "../document/config-document"
import { INT32_MAX } from "../json/json-value"
import { getUint32 } from "./scalar-accessors"

/** Document keys holding each rectangle field. */
export type RectKeys = Readonly<{
  left: string
  top: string
  width: string
  height: string
}>

export type Rect = {
  left: number
  top: number
  width: number
  height: number
}

/**
 * Rectangle from four unsigned 32-bit values.
 *
 * `left` and `top` default to 0. Width and height are both required; when
 * only one of them is usable a warning is logged.
 */
export function getRect(doc: ConfigDocument, keys: RectKeys, logger: Logger): Rect | undefined {
  const width = getUint32(doc, keys.width)
  const height = getUint32(doc, keys.height)

  if (width === undefined || height === undefined) {
    if ((width === undefined) !== (height === undefined)) {
      logger.warn(
        `Both ${keys.width} and ${keys.height} must be provided. Using default behavior.`,
        { key: width === undefined ? keys.width : keys.height },
      )
    }

    return undefined
  }

  return {
    left: getUint32(doc, keys.left) ?? 0,
    top: getUint32(doc, keys.top) ?? 0,
    width,
    height,
  }
}

/** {@link getRect}, rejected as a whole when any field exceeds the int32 range. */
export function getInt32Rect(
  doc: ConfigDocument,
  keys: RectKeys,
  logger: Logger,
): Rect | undefined {
  const rect = getRect(doc, keys, logger)
  if (!rect) return undefined

  const max = Number(INT32_MAX)
  const fits = [rect.left, rect.top, rect.width, rect.height].every((field) => field <= max)

  return fits ? rect : undefined
}
