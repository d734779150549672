import fs from 'fs-extra'
import path from 'path'

export interface FastaRecord {
  header: string
  sequence: string
}

export const recordId = (record: FastaRecord): string =>
  record.header.split(/\s+/)[0]

export const parseFasta = (content: string): FastaRecord[] => {
  const records: FastaRecord[] = []
  let header: string | null = null
  let seqLines: string[] = []

  for (const raw of content.split('\n')) {
    const line = raw.trim()
    if (!line) continue
    if (line.startsWith('>')) {
      if (header !== null) {
        records.push({ header, sequence: seqLines.join('') })
      }
      header = line.slice(1).trim()
      seqLines = []
    } else {
      seqLines.push(line.toUpperCase())
    }
  }
  if (header !== null) {
    records.push({ header, sequence: seqLines.join('') })
  }
  return records
}

export const readFasta = async (fastaPath: string): Promise<FastaRecord[]> =>
  parseFasta(await fs.readFile(fastaPath, 'utf8'))

export const formatFasta = (records: FastaRecord[]): string =>
  records
    .flatMap((rec) => {
      const lines = [`>${rec.header}`]
      // wrap at 80 chars
      for (let i = 0; i < rec.sequence.length; i += 80) {
        lines.push(rec.sequence.slice(i, i + 80))
      }
      return lines
    })
    .join('\n') + '\n'

export const writeFasta = async (
  records: FastaRecord[],
  fastaPath: string
): Promise<void> => {
  await fs.ensureDir(path.dirname(fastaPath))
  await fs.writeFile(fastaPath, formatFasta(records))
}
