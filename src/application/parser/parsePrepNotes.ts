export interface PrepResult {
  text: string
  preparation: string | null
}

/**
 * Split a trailing preparation clause on the first comma:
 * "butter, melted" → text "butter", preparation "melted".
 * Later commas stay inside the preparation.
 */
export function parsePrepNotes(text: string): PrepResult {
  const commaIndex = text.indexOf(',')
  if (commaIndex < 0) return { text: text.trim(), preparation: null }

  const preparation = text.slice(commaIndex + 1).trim()
  return {
    text: text.slice(0, commaIndex).trim(),
    preparation: preparation.length > 0 ? preparation : null,
  }
}
