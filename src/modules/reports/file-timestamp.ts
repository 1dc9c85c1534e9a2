const pad = (value: number) => String(value).padStart(2, '0')

/** Local `YYYYMMDD_HHmmss`, sortable and safe in file names. */
export function fileTimestamp(date: Date): string {
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	)
}
