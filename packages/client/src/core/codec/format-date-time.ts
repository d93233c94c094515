import { ConversionError } from "../../errors/client-errors"

/** Whether `formatDateTime` can render the date: valid, years 1 through 9999. */
export function isWireDate(date: Date): boolean {
  if (Number.isNaN(date.getTime())) return false

  const year = date.getFullYear()
  return year >= 1 && year <= 9999
}

/**
 * Renders a date as `YYYY-MM-DDThh:mm:ss±hh:mm` in the process's local offset.
 *
 * The format is fixed for wire compatibility: no milliseconds, always an
 * explicit numeric offset (`+00:00`, never `Z`).
 */
export function formatDateTime(date: Date): string {
  const time = date.getTime()

  if (Number.isNaN(time)) {
    throw new ConversionError("Cannot encode an invalid Date")
  }

  const year = date.getFullYear()

  if (year < 1 || year > 9999) {
    throw new ConversionError(`Cannot encode a Date outside years 1-9999 (got ${year})`, {
      year,
    })
  }

  const offset = -date.getTimezoneOffset()
  const sign = offset < 0 ? "-" : "+"
  const absOffset = Math.abs(offset)

  const datePart = `${pad(year, 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const timePart = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  const offsetPart = `${sign}${pad(Math.trunc(absOffset / 60))}:${pad(absOffset % 60)}`

  return `${datePart}T${timePart}${offsetPart}`
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0")
}
