// Shared by the table badges and the map markers so both read the same.
export const STATUS_COLORS: Record<string, string> = {
  Planned:   '#F59E0B',
  Unplanned: '#EF4444',
}

export const FALLBACK_STATUS_COLOR = '#6B7280'

export function statusColor(status: string): string {
  return STATUS_COLORS[status] ?? FALLBACK_STATUS_COLOR
}
