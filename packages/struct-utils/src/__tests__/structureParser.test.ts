import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import os from 'os'
import {
  parsePdbCoordinates,
  parseCifCoordinates,
  readBackboneCoordinates
} from '../structureParser.js'
import { ClusteringInputError } from '../errors.js'
import { formatAtomLine } from './fixtures.js'

const pdbContent = [
  'MODEL        1',
  formatAtomLine(1, ' P', 1, [1, 2, 3]),
  formatAtomLine(2, " C3'", 1, [4, 5, 6]),
  formatAtomLine(3, ' N1', 1, [7, 8, 9]),
  formatAtomLine(4, ' P', 2, [10, 11, 12], 'B'),
  'ENDMDL',
  'MODEL        2',
  formatAtomLine(5, ' P', 1, [0, 0, 0]),
  'ENDMDL',
  'END'
].join('\n')

const cifContent = `data_test
loop_
_atom_site.group_PDB
_atom_site.id
_atom_site.label_atom_id
_atom_site.label_alt_id
_atom_site.Cartn_x
_atom_site.Cartn_y
_atom_site.Cartn_z
_atom_site.pdbx_PDB_model_num
ATOM 1 P . 1.000 2.000 3.000 1
ATOM 2 "C3'" . 4.000 5.000 6.000 1
ATOM 3 N1 . 7.000 8.000 9.000 1
ATOM 4 P . 9.000 9.000 9.000 2
#
`

let tempDir: string

beforeAll(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'struct-parser-'))
})

afterAll(async () => {
  await fs.remove(tempDir)
})

describe('parsePdbCoordinates', () => {
  it('keeps backbone atoms of the first model only', () => {
    expect(parsePdbCoordinates(pdbContent)).toEqual([
      [1, 2, 3],
      [4, 5, 6]
    ])
  })

  it('honours a custom atom selection', () => {
    expect(parsePdbCoordinates(pdbContent, ['N1'])).toEqual([[7, 8, 9]])
  })
})

describe('parseCifCoordinates', () => {
  it('reads quoted atom names from the atom_site loop', () => {
    expect(parseCifCoordinates(cifContent)).toEqual([
      [1, 2, 3],
      [4, 5, 6]
    ])
  })

  it('rejects unknown coordinates', () => {
    const unknown = cifContent.replace('ATOM 2 "C3\'" . 4.000 5.000', 'ATOM 2 "C3\'" . ? 5.000')
    expect(unknown).not.toBe(cifContent)
    expect(() => parseCifCoordinates(unknown)).toThrow(ClusteringInputError)
  })

  it('returns nothing when there is no atom_site loop', () => {
    expect(parseCifCoordinates('data_empty\n')).toEqual([])
  })
})

describe('readBackboneCoordinates', () => {
  it('dispatches on the file extension', async () => {
    const pdbPath = path.join(tempDir, 'model.pdb')
    const cifPath = path.join(tempDir, 'model.cif')
    await fs.writeFile(pdbPath, pdbContent)
    await fs.writeFile(cifPath, cifContent)

    expect(await readBackboneCoordinates(pdbPath)).toHaveLength(2)
    expect(await readBackboneCoordinates(cifPath)).toHaveLength(2)
  })

  it('fails when no backbone atom is present', async () => {
    const emptyPath = path.join(tempDir, 'empty.pdb')
    await fs.writeFile(emptyPath, 'END\n')
    await expect(readBackboneCoordinates(emptyPath)).rejects.toBeInstanceOf(
      ClusteringInputError
    )
  })
})
