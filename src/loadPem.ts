import { checkFile } from '@universal-packages/fs-utils'
import fs from 'fs'

/** PEM contents inlined in environment variables often carry literal `\n` sequences. */
export function normalizePem(pem: string): string {
  return pem.replace(/\\n/g, '\n').trim()
}

export function loadPem(location: string): string {
  const finalLocation = checkFile(location)

  return normalizePem(fs.readFileSync(finalLocation, 'utf8'))
}
