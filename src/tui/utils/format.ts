export function truncate(str: string, maxLen: number, ellipsis: string = '...'): string {
  if (str.length <= maxLen) return str
  if (maxLen <= ellipsis.length) return str.slice(0, maxLen)
  return str.slice(0, maxLen - ellipsis.length) + ellipsis
}

export function padEnd(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length)
}
