import { Filter } from 'lucide-react'
import { STATUS_FILTERS, isStatusFilter } from '../lib/faults'
import type { StatusFilter as StatusFilterValue } from '../lib/faults'

export interface StatusFilterProps {
  value: StatusFilterValue
  onChange: (value: StatusFilterValue) => void
  disabled?: boolean
}

export default function StatusFilter({ value, onChange, disabled = false }: StatusFilterProps) {
  return (
    <label className="flex items-center gap-2 text-sm text-gray-600 dark:text-gray-300">
      <Filter size={15} className="text-gray-400" />
      <span>Status</span>
      <select
        aria-label="Status filter"
        value={value}
        disabled={disabled}
        onChange={e => {
          const next = e.target.value
          if (isStatusFilter(next)) onChange(next)
        }}
        className="w-48 rounded-md border border-gray-300 bg-white px-2 py-1.5 text-sm text-gray-800 focus:outline-none focus:ring-2 focus:ring-amber-400 dark:border-gray-700 dark:bg-gray-800 dark:text-gray-100"
      >
        {STATUS_FILTERS.map(s => (
          <option key={s} value={s}>{s}</option>
        ))}
      </select>
    </label>
  )
}
