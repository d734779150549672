import type { Coordinates, Vec3 } from '../structureParser.js'

export const formatAtomLine = (
  serial: number,
  name: string,
  resSeq: number,
  [x, y, z]: Vec3,
  altLoc = ' '
): string =>
  'ATOM  ' +
  String(serial).padStart(5) +
  ' ' +
  name.padEnd(4) +
  altLoc +
  '  G' +
  ' A' +
  String(resSeq).padStart(4) +
  '    ' +
  x.toFixed(3).padStart(8) +
  y.toFixed(3).padStart(8) +
  z.toFixed(3).padStart(8) +
  '  1.00  0.00           C'

/** Writes coordinates as alternating P / C3' backbone atoms */
export const toPdb = (coords: Coordinates): string =>
  coords
    .map((c, i) =>
      formatAtomLine(i + 1, i % 2 === 0 ? ' P' : " C3'", Math.floor(i / 2) + 1, c)
    )
    .concat(['END'])
    .join('\n')

export const baseCoords: Coordinates = [
  [0, 0, 0],
  [1.5, 0.2, 0.1],
  [2.9, 1.1, 0.4],
  [3.6, 2.7, 1.3],
  [3.1, 4.2, 2.5],
  [1.8, 5.0, 3.6]
]

// 90 degrees about z, then translated
export const rotateAndShift = (coords: Coordinates, shift: Vec3): Coordinates =>
  coords.map(([x, y, z]) => [-y + shift[0], x + shift[1], z + shift[2]])
