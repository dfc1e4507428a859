// CIFP coordinates: hemisphere letter, degrees, minutes and seconds with
// two implied decimals. N40381200 = N40°38'12.00"

const CENTISECONDS_PER_DEGREE = 360000
const CENTISECONDS_PER_MINUTE = 6000

function toDecimal(hemisphere: string, degrees: string, minutes: string, centiseconds: string): number {
  const decimal =
    parseInt(degrees, 10) +
    parseInt(minutes, 10) / 60 +
    parseInt(centiseconds, 10) / CENTISECONDS_PER_DEGREE
  return hemisphere === 'S' || hemisphere === 'W' ? -decimal : decimal
}

export function parseLatitude(value: string): number | null {
  const match = value.match(/^([NS])(\d{2})([0-5]\d)(\d{4})$/)
  if (!match) return null
  const decimal = toDecimal(match[1], match[2], match[3], match[4])
  return Math.abs(decimal) > 90 ? null : decimal
}

export function parseLongitude(value: string): number | null {
  const match = value.match(/^([EW])(\d{3})([0-5]\d)(\d{4})$/)
  if (!match) return null
  const decimal = toDecimal(match[1], match[2], match[3], match[4])
  return Math.abs(decimal) > 180 ? null : decimal
}

// Rounded to the nearest hundredth of a second, the precision of the format
function toDms(value: number, degreeDigits: number): string {
  const total = Math.round(Math.abs(value) * CENTISECONDS_PER_DEGREE)
  const degrees = Math.floor(total / CENTISECONDS_PER_DEGREE)
  const remainder = total - degrees * CENTISECONDS_PER_DEGREE
  const minutes = Math.floor(remainder / CENTISECONDS_PER_MINUTE)
  const centiseconds = remainder - minutes * CENTISECONDS_PER_MINUTE
  return (
    String(degrees).padStart(degreeDigits, '0') +
    String(minutes).padStart(2, '0') +
    String(centiseconds).padStart(4, '0')
  )
}

// W0000 and S00000000 read as -0; the sign survives re-encoding
export function isNegative(value: number): boolean {
  return value < 0 || Object.is(value, -0)
}

export function formatLatitude(value: number): string {
  return `${isNegative(value) ? 'S' : 'N'}${toDms(value, 2)}`
}

export function formatLongitude(value: number): string {
  return `${isNegative(value) ? 'W' : 'E'}${toDms(value, 3)}`
}
