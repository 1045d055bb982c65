/**
 * Derivation path helpers
 *
 * Paths are stored relative to a keystore root as `"0/5"`, never with a
 * leading `m`. Hardened components are not used below a keystore.
 *
 * @module domain/wallet/derivationPath
 */

import { KEYS } from '../../config'
import type { DerivationPath, Result } from '../types'
import { err, ok } from '../types'

/**
 * Render a relative path for storage, e.g. `[0, 5]` → `"0/5"`
 */
export function formatDerivationPath(path: DerivationPath): string {
  return path.join('/')
}

/**
 * Parse a stored relative path. The empty string is the root.
 */
export function parseDerivationPath(text: string): Result<DerivationPath, string> {
  if (text === '') return ok([])

  const path: number[] = []
  for (const part of text.split('/')) {
    if (!/^\d+$/.test(part)) {
      return err(`Invalid derivation path component "${part}" in "${text}"`)
    }
    const index = Number(part)
    if (index >= KEYS.HARDENED_OFFSET) {
      return err(`Hardened index ${index} is not allowed in "${text}"`)
    }
    path.push(index)
  }
  return ok(path)
}

/**
 * Express a relative path in the `m/...` form HD.derive expects
 */
export function toBip32Path(path: DerivationPath): string {
  return ['m', ...path.map(String)].join('/')
}

/**
 * Validate an absolute BIP32 path such as `m/44'/236'/0'`
 */
export function isValidBip32Path(text: string): boolean {
  return /^m(\/\d+'?)*$/.test(text)
}

export function isPathUnder(path: DerivationPath, prefix: DerivationPath): boolean {
  return path.length === prefix.length + 1 && prefix.every((value, i) => path[i] === value)
}

export function lastIndex(path: DerivationPath): number | undefined {
  return path[path.length - 1]
}

export function samePath(a: DerivationPath, b: DerivationPath): boolean {
  return a.length === b.length && a.every((value, i) => b[i] === value)
}
