const pad = (value: number) => String(value).padStart(2, '0')

/** `YYYY-MM-DD HH:mm` in UTC. */
export function formatDateTime(date: Date | null | undefined): string {
	if (!date) return '-'
	return (
		`${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
		`${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
	)
}

export function truncate(text: string, max: number): string {
	if (text.length <= max) return text
	return `${text.slice(0, Math.max(0, max - 1))}…`
}

export function displayName(from: {
	first_name: string
	last_name?: string
	username?: string
}): string {
	const full = [from.first_name, from.last_name].filter(Boolean).join(' ').trim()
	return full || from.username || ''
}
