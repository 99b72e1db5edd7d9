const TRUNCATION_SUFFIX = "\n\n... (truncated)"

export const formatUptime = (uptimeSeconds: number): string => {
  const total = Math.max(0, Math.floor(uptimeSeconds))
  const days = Math.floor(total / 86_400)
  const hours = Math.floor((total % 86_400) / 3600)
  const minutes = Math.floor((total % 3600) / 60)

  const parts: Array<string> = []
  if (days) parts.push(`${days}d`)
  if (hours) parts.push(`${hours}h`)
  if (minutes) parts.push(`${minutes}m`)

  return parts.length > 0 ? parts.join(" ") : "0m"
}

/**
 * Fits model output into one chat message. Long text is cut at the last
 * sentence or line break when that keeps at least 70% of the limit.
 */
export const formatMessage = (text: string, maxLength = 4096): string => {
  if (!text.trim()) {
    return "No response generated."
  }
  if (text.length <= maxLength) {
    return text
  }

  const budget = maxLength - TRUNCATION_SUFFIX.length
  const head = text.slice(0, budget)
  const cutPoint = Math.max(head.lastIndexOf("."), head.lastIndexOf("\n"))

  if (cutPoint > maxLength * 0.7) {
    return `${text.slice(0, cutPoint + 1)}${TRUNCATION_SUFFIX}`
  }
  return `${head}${TRUNCATION_SUFFIX}`
}

export const truncateText = (
  text: string,
  maxLength: number,
  suffix = "...",
): string => {
  if (text.length <= maxLength) return text
  return text.slice(0, Math.max(0, maxLength - suffix.length)) + suffix
}

export const percentage = (part: number, whole: number): number =>
  Math.round((part / Math.max(whole, 1)) * 100 * 100) / 100

export const formatMegabytes = (bytes: number): string =>
  `${(bytes / (1024 * 1024)).toFixed(1)}MB`
