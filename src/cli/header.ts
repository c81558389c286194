import type {DumpHeader} from '../descriptors/pgdump/header.js'

const days = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat']
const months = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/** `Mon Jan  2 03:04:05 2023`, in local time. */
export function formatCtime(date: Date): string {
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${days[date.getDay()]} ${months[date.getMonth()]} ${String(date.getDate()).padStart(2, ' ')} ${time} ${date.getFullYear()}`
}

/**
 * Informational block printed before restoring, in the layout pg_restore
 * uses for its listings. Unknown values are left out.
 */
export function formatHeader(header: DumpHeader): string {
  const {version} = header
  const lines = [';']
  if (header.createdAt) {
    lines.push(`; Archive created at ${formatCtime(header.createdAt)}`)
  }

  if (header.dbname !== undefined) {
    lines.push(`;     dbname: ${header.dbname}`)
  }

  if (header.tocCount !== undefined) {
    lines.push(`;     TOC Entries: ${header.tocCount}`)
  }

  lines.push(
    `;     Compression: ${header.compression}`,
    `;     Dump Version: ${version.major}.${version.minor}-${version.revision}`,
    `;     Format: ${header.format}`,
    `;     Integer: ${header.intSize} bytes`,
    `;     Offset: ${header.offSize} bytes`
  )

  if (header.serverVersion !== undefined) {
    lines.push(`;     Dumped from database version: ${header.serverVersion}`)
  }

  if (header.dumpVersion !== undefined) {
    lines.push(`;     Dumped by pg_dump version: ${header.dumpVersion}`)
  }

  lines.push(';')
  return lines.map(line => `${line}\n`).join('')
}
