import type { Coordinates, Vec3 } from './structureParser.js'
import { ClusteringInputError } from './errors.js'

const centroid = (coords: Coordinates): Vec3 => {
  const c: Vec3 = [0, 0, 0]
  for (const [x, y, z] of coords) {
    c[0] += x
    c[1] += y
    c[2] += z
  }
  return [c[0] / coords.length, c[1] / coords.length, c[2] / coords.length]
}

const center = (coords: Coordinates): Coordinates => {
  const [cx, cy, cz] = centroid(coords)
  return coords.map(([x, y, z]) => [x - cx, y - cy, z - cz])
}

/**
 * Eigenvalues of a real symmetric matrix by cyclic Jacobi rotations.
 */
export function symmetricEigenvalues(input: number[][], maxSweeps = 100): number[] {
  const n = input.length
  const a = input.map((row) => [...row])

  for (let sweep = 0; sweep < maxSweeps; sweep++) {
    let off = 0
    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        off += a[p][q] * a[p][q]
      }
    }
    if (off < 1e-22) {
      break
    }

    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        if (Math.abs(a[p][q]) < 1e-300) {
          continue
        }
        const theta = (a[q][q] - a[p][p]) / (2 * a[p][q])
        const t =
          Math.sign(theta || 1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1))
        const c = 1 / Math.sqrt(t * t + 1)
        const s = t * c

        for (let k = 0; k < n; k++) {
          const akp = a[k][p]
          const akq = a[k][q]
          a[k][p] = c * akp - s * akq
          a[k][q] = s * akp + c * akq
        }
        for (let k = 0; k < n; k++) {
          const apk = a[p][k]
          const aqk = a[q][k]
          a[p][k] = c * apk - s * aqk
          a[q][k] = s * apk + c * aqk
        }
      }
    }
  }

  return a.map((row, i) => row[i])
}

/**
 * Root-mean-square deviation after optimal rigid-body superposition
 * (translation + proper rotation), using Horn's quaternion method: the
 * largest eigenvalue of the 4x4 key matrix built from the cross-covariance
 * of the centered coordinates gives the minimal residual directly.
 */
export function superposedRmsd(a: Coordinates, b: Coordinates): number {
  if (a.length !== b.length) {
    throw new ClusteringInputError(
      `Atom count mismatch: ${a.length} vs ${b.length}`
    )
  }
  if (a.length === 0) {
    throw new ClusteringInputError('Cannot superpose empty coordinate sets')
  }

  const ca = center(a)
  const cb = center(b)

  let sxx = 0, sxy = 0, sxz = 0
  let syx = 0, syy = 0, syz = 0
  let szx = 0, szy = 0, szz = 0
  let ga = 0
  let gb = 0

  for (let i = 0; i < ca.length; i++) {
    const [ax, ay, az] = ca[i]
    const [bx, by, bz] = cb[i]
    sxx += ax * bx
    sxy += ax * by
    sxz += ax * bz
    syx += ay * bx
    syy += ay * by
    syz += ay * bz
    szx += az * bx
    szy += az * by
    szz += az * bz
    ga += ax * ax + ay * ay + az * az
    gb += bx * bx + by * by + bz * bz
  }

  const key = [
    [sxx + syy + szz, syz - szy, szx - sxz, sxy - syx],
    [syz - szy, sxx - syy - szz, sxy + syx, szx + sxz],
    [szx - sxz, sxy + syx, -sxx + syy - szz, syz + szy],
    [sxy - syx, szx + sxz, syz + szy, -sxx - syy + szz]
  ]
  const lambdaMax = Math.max(...symmetricEigenvalues(key))
  const residual = Math.max(0, ga + gb - 2 * lambdaMax)

  return Math.sqrt(residual / ca.length)
}
