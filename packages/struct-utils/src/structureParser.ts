import fs from 'fs-extra'
import path from 'path'
import { ClusteringInputError } from './errors.js'

export type Vec3 = [number, number, number]
export type Coordinates = Vec3[]

// Backbone atoms used for structural comparison of RNA models
export const DEFAULT_BACKBONE_ATOMS = ["C3'", 'P'] as const

/**
 * Extracts coordinates of the selected atoms from the first model of a PDB
 * file. Alternate locations other than blank or 'A' are dropped.
 */
export function parsePdbCoordinates(
  content: string,
  atomNames: readonly string[] = DEFAULT_BACKBONE_ATOMS
): Coordinates {
  const wanted = new Set(atomNames)
  const coords: Coordinates = []

  for (const line of content.split('\n')) {
    if (line.startsWith('ENDMDL')) {
      // only the first model
      break
    }
    if (!line.startsWith('ATOM') && !line.startsWith('HETATM')) {
      continue
    }
    const name = line.slice(12, 16).trim()
    const altLoc = line.charAt(16)
    if (!wanted.has(name) || (altLoc !== ' ' && altLoc !== '' && altLoc !== 'A')) {
      continue
    }
    const x = parseFloat(line.slice(30, 38))
    const y = parseFloat(line.slice(38, 46))
    const z = parseFloat(line.slice(46, 54))
    if ([x, y, z].some((v) => Number.isNaN(v))) {
      throw new ClusteringInputError(`Malformed coordinates in line: ${line}`)
    }
    coords.push([x, y, z])
  }

  return coords
}

const tokenizeCifRow = (line: string): string[] =>
  line.match(/'(?:[^']|'(?=\S))*'|"(?:[^"]|"(?=\S))*"|\S+/g)?.map((token) =>
    /^(['"]).*\1$/.test(token) ? token.slice(1, -1) : token
  ) ?? []

/**
 * Extracts coordinates of the selected atoms from the `_atom_site` loop of
 * an mmCIF file, restricted to the first model number encountered.
 */
export function parseCifCoordinates(
  content: string,
  atomNames: readonly string[] = DEFAULT_BACKBONE_ATOMS
): Coordinates {
  const wanted = new Set(atomNames)
  const lines = content.split('\n')
  const coords: Coordinates = []

  let i = 0
  while (i < lines.length && !lines[i].startsWith('_atom_site.')) {
    i++
  }
  const fields: string[] = []
  while (i < lines.length && lines[i].startsWith('_atom_site.')) {
    fields.push(lines[i].trim().slice('_atom_site.'.length))
    i++
  }
  if (fields.length === 0) {
    return coords
  }

  const col = (name: string) => fields.indexOf(name)
  const nameCol = col('label_atom_id') >= 0 ? col('label_atom_id') : col('auth_atom_id')
  const xCol = col('Cartn_x')
  const yCol = col('Cartn_y')
  const zCol = col('Cartn_z')
  const altCol = col('label_alt_id')
  const modelCol = col('pdbx_PDB_model_num')
  if (nameCol < 0 || xCol < 0 || yCol < 0 || zCol < 0) {
    throw new ClusteringInputError('mmCIF _atom_site loop lacks atom names or coordinates')
  }

  let firstModel: string | undefined
  for (; i < lines.length; i++) {
    const line = lines[i].trim()
    if (line === '' || line === '#' || line.startsWith('loop_') || line.startsWith('_')) {
      break
    }
    const row = tokenizeCifRow(line)
    if (row.length < fields.length) {
      continue
    }
    if (modelCol >= 0) {
      firstModel ??= row[modelCol]
      if (row[modelCol] !== firstModel) {
        break
      }
    }
    if (!wanted.has(row[nameCol])) {
      continue
    }
    if (altCol >= 0 && !['.', '?', 'A'].includes(row[altCol])) {
      continue
    }
    const xyz: Vec3 = [parseFloat(row[xCol]), parseFloat(row[yCol]), parseFloat(row[zCol])]
    if (xyz.some((v) => Number.isNaN(v))) {
      throw new ClusteringInputError(`Malformed coordinates in line: ${line}`)
    }
    coords.push(xyz)
  }

  return coords
}

/**
 * Reads a PDB or mmCIF file and returns the selected backbone coordinates.
 */
export async function readBackboneCoordinates(
  structurePath: string,
  atomNames: readonly string[] = DEFAULT_BACKBONE_ATOMS
): Promise<Coordinates> {
  const content = await fs.readFile(structurePath, 'utf8')
  const ext = path.extname(structurePath).toLowerCase()
  const coords =
    ext === '.cif' || ext === '.mmcif'
      ? parseCifCoordinates(content, atomNames)
      : parsePdbCoordinates(content, atomNames)

  if (coords.length === 0) {
    throw new ClusteringInputError(
      `No backbone atoms (${atomNames.join('/')}) found in ${structurePath}`
    )
  }
  return coords
}
