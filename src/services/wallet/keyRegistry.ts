/**
 * Key Derivation Registry
 *
 * Allocates key instances under a derivation prefix and registers the
 * scripts each one can be paid to. Indices come from a persisted
 * watermark per (account, masterkey, prefix) and are never reused.
 */

import { KEYS } from '../../config'
import type { KeyMaterial } from '../../domain/scripts/templates'
import { scriptFor, scriptHashOf } from '../../domain/scripts/templates'
import type { DerivationPath, KeyInstance, ScriptType } from '../../domain/types'
import { isOk } from '../../domain/types'
import { formatDerivationPath } from '../../domain/wallet/derivationPath'
import type { KeyScript, NewKeyInstance, SqlExecutor } from '../../infrastructure/database'
import { createKeyInstances, readWatermark, writeWatermark } from '../../infrastructure/database'
import type { DerivingAccount, ImportedAccount } from '../accounts'
import { accountScriptTypes, keyDerivationTypeFor } from '../accounts'
import { DerivationExhaustedError, IncompatibleWalletError } from '../errors'
import type { ImportedKey } from '../keystores'
import { importedKeyToDerivationData, publicMaterialForPath } from '../keystores'
import { keyLogger } from '../logger'

/**
 * Scripts (and their hashes) a key can be paid to
 */
export function keyScriptsFor(material: KeyMaterial, scriptTypes: readonly ScriptType[]): KeyScript[] {
  return scriptTypes.map(scriptType => {
    const script = scriptFor(material, scriptType)
    if (!isOk(script)) {
      throw new IncompatibleWalletError(script.error, { scriptType })
    }
    return { scriptType, scriptHash: scriptHashOf(script.value) }
  })
}

function importedMaterial(key: ImportedKey): KeyMaterial {
  return key.kind === 'private_key'
    ? { kind: 'public_key', publicKey: key.publicKey }
    : { kind: 'public_key_hash', hash160: key.hash160 }
}

/**
 * Allocate `count` new keys directly under `prefix`
 *
 * @throws DerivationExhaustedError when an index would reach the hardened range
 */
export async function allocateKeys(
  db: SqlExecutor,
  account: DerivingAccount,
  prefix: DerivationPath,
  count: number
): Promise<KeyInstance[]> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Key count must be a non-negative integer, got ${count}`)
  }
  if (count === 0) return []

  return db.withTransaction(async scope => {
    const next = await readWatermark(scope, account.accountId, account.masterkeyId, prefix)
    if (next + count > KEYS.HARDENED_OFFSET) {
      throw new DerivationExhaustedError(formatDerivationPath(prefix), next)
    }

    const scriptTypes = accountScriptTypes(account.kind)
    const derivationType = keyDerivationTypeFor(account)
    const entries: NewKeyInstance[] = []
    for (let index = next; index < next + count; index++) {
      const path = [...prefix, index]
      entries.push({
        accountId: account.accountId,
        masterkeyId: account.masterkeyId,
        derivationType,
        derivationPath: path,
        derivationData: null,
        scriptType: account.defaultScriptType,
        scripts: keyScriptsFor(publicMaterialForPath(account.keystore, path), scriptTypes)
      })
    }

    const created = await createKeyInstances(scope, entries)
    await writeWatermark(scope, account.accountId, account.masterkeyId, prefix, next + count)
    keyLogger.debug('Allocated keys', {
      accountId: account.accountId,
      prefix: formatDerivationPath(prefix),
      from: next,
      count
    })
    return created
  })
}

/**
 * Allocate every key from the watermark up to and including `path`.
 * Returns nothing when `path` is already allocated.
 */
export async function deriveKeysUntil(
  db: SqlExecutor,
  account: DerivingAccount,
  path: DerivationPath
): Promise<KeyInstance[]> {
  const target = path[path.length - 1]
  if (target === undefined) {
    throw new RangeError('Cannot derive up to an empty path')
  }
  if (target >= KEYS.HARDENED_OFFSET) {
    throw new DerivationExhaustedError(formatDerivationPath(path.slice(0, -1)), target)
  }
  const prefix = path.slice(0, -1)
  const next = await readWatermark(db, account.accountId, account.masterkeyId, prefix)
  if (target < next) return []
  return allocateKeys(db, account, prefix, target - next + 1)
}

/**
 * One key instance per imported private key or address
 */
export async function createImportedKeys(
  db: SqlExecutor,
  account: ImportedAccount,
  keys: readonly ImportedKey[]
): Promise<KeyInstance[]> {
  const scriptTypes = accountScriptTypes(account.kind)
  const derivationType = keyDerivationTypeFor(account)
  const entries: NewKeyInstance[] = keys.map(key => ({
    accountId: account.accountId,
    masterkeyId: null,
    derivationType,
    derivationPath: null,
    derivationData: importedKeyToDerivationData(key),
    scriptType: account.defaultScriptType,
    scripts: keyScriptsFor(importedMaterial(key), scriptTypes)
  }))
  const created = await createKeyInstances(db, entries)
  created.forEach((instance, i) => {
    const key = keys[i]
    if (key) account.keystore.keys.set(instance.keyinstanceId, key)
  })
  return created
}
