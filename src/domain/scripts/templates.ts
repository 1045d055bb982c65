/**
 * Script/Address Template Resolver
 *
 * Pure functions from public key material and a script type to a locking
 * script, and back from a locking script to its template. Only the standard
 * output templates are recognised.
 *
 * @module domain/scripts/templates
 */

import { Hash, LockingScript, OP, Script, Utils } from '@bsv/sdk'
import type { NetworkParams } from '../networks'
import type { Result, ScriptType } from '../types'
import { err, ok } from '../types'

/**
 * Public material a key instance resolves to
 */
export type KeyMaterial =
  /** A single public key, compressed (33 bytes) or uncompressed (65 bytes), hex */
  | { kind: 'public_key'; publicKey: string }
  /** Only the hash of a public key is known (watched address) */
  | { kind: 'public_key_hash'; hash160: string }
  /** Cosigner public keys in the keystore's stored order */
  | { kind: 'multisig'; threshold: number; publicKeys: string[] }

/** Script types a key material kind can produce */
export function supportedScriptTypes(material: KeyMaterial): readonly ScriptType[] {
  switch (material.kind) {
    case 'public_key':
      return ['P2PKH', 'P2PK']
    case 'public_key_hash':
      return ['P2PKH']
    case 'multisig':
      return ['MULTISIG_BARE', 'MULTISIG_P2SH']
  }
}

function smallIntOpcode(value: number): string {
  return `OP_${value}`
}

function p2pkhScript(hash160: string): LockingScript {
  return new LockingScript(
    Script.fromASM(`OP_DUP OP_HASH160 ${hash160} OP_EQUALVERIFY OP_CHECKSIG`).chunks
  )
}

function multisigRedeemScript(threshold: number, publicKeys: string[]): Script {
  const keys = publicKeys.join(' ')
  return Script.fromASM(
    `${smallIntOpcode(threshold)} ${keys} ${smallIntOpcode(publicKeys.length)} OP_CHECKMULTISIG`
  )
}

/**
 * Resolve the locking script for key material under a script type.
 *
 * Multisig keys are used in the order given: reordering cosigners yields a
 * different script. `NONE` and mismatched combinations are errors.
 */
export function scriptFor(material: KeyMaterial, scriptType: ScriptType): Result<LockingScript, string> {
  if (!supportedScriptTypes(material).includes(scriptType)) {
    return err(`Script type ${scriptType} is not available for ${material.kind} keys`)
  }

  switch (material.kind) {
    case 'public_key':
      if (scriptType === 'P2PK') {
        return ok(new LockingScript(Script.fromASM(`${material.publicKey} OP_CHECKSIG`).chunks))
      }
      return ok(p2pkhScript(Utils.toHex(Hash.hash160(Utils.toArray(material.publicKey, 'hex')))))

    case 'public_key_hash':
      return ok(p2pkhScript(material.hash160))

    case 'multisig': {
      const { threshold, publicKeys } = material
      if (!Number.isInteger(threshold) || threshold < 1 || threshold > publicKeys.length || publicKeys.length > 16) {
        return err(`Invalid multisig policy ${threshold} of ${publicKeys.length}`)
      }
      const redeemScript = multisigRedeemScript(threshold, publicKeys)
      if (scriptType === 'MULTISIG_BARE') {
        return ok(new LockingScript(redeemScript.chunks))
      }
      const scriptHash = Utils.toHex(Hash.hash160(redeemScript.toBinary()))
      return ok(new LockingScript(Script.fromASM(`OP_HASH160 ${scriptHash} OP_EQUAL`).chunks))
    }
  }
}

/**
 * sha256 of the full locking script, hex. This is the key the ledger
 * matches outputs on.
 */
export function scriptHashOf(script: Script | number[]): string {
  const bytes = Array.isArray(script) ? script : script.toBinary()
  return Utils.toHex(Hash.sha256(bytes))
}

const P2PKH_PATTERN = /^76a914([0-9a-f]{40})88ac$/
const P2SH_PATTERN = /^a914([0-9a-f]{40})87$/
const P2PK_PATTERN = /^(?:21[0-9a-f]{66}|41[0-9a-f]{130})ac$/

function smallIntValue(op: number): number | null {
  return op >= OP.OP_1 && op <= OP.OP_16 ? op - OP.OP_1 + 1 : null
}

function isBareMultisig(script: Script): boolean {
  const { chunks } = script
  const first = chunks[0]
  const countChunk = chunks[chunks.length - 2]
  const last = chunks[chunks.length - 1]
  if (first === undefined || countChunk === undefined || last === undefined) return false
  if (last.op !== OP.OP_CHECKMULTISIG) return false

  const threshold = smallIntValue(first.op)
  const count = smallIntValue(countChunk.op)
  if (threshold === null || count === null || threshold > count) return false

  const keys = chunks.slice(1, -2)
  return keys.length === count &&
    keys.every(chunk => chunk.data !== undefined && (chunk.data.length === 33 || chunk.data.length === 65))
}

/**
 * Recognise the standard output templates. Anything else is `NONE`.
 */
export function classifyScript(scriptHex: string): ScriptType {
  const hex = scriptHex.toLowerCase()
  if (P2PKH_PATTERN.test(hex)) return 'P2PKH'
  if (P2SH_PATTERN.test(hex)) return 'MULTISIG_P2SH'
  if (P2PK_PATTERN.test(hex)) return 'P2PK'

  try {
    if (isBareMultisig(Script.fromHex(hex))) return 'MULTISIG_BARE'
  } catch (_error) {
    // Unparseable scripts are non-standard
    return 'NONE'
  }
  return 'NONE'
}

/**
 * Render a P2PKH or P2SH locking script as a Base58Check address.
 * Other templates have no address form.
 */
export function addressFor(script: Script, network: NetworkParams): Result<string, string> {
  const hex = script.toHex()

  const p2pkh = P2PKH_PATTERN.exec(hex)
  if (p2pkh?.[1] !== undefined) {
    return ok(Utils.toBase58Check(Utils.toArray(p2pkh[1], 'hex'), [network.addressPrefix]))
  }

  const p2sh = P2SH_PATTERN.exec(hex)
  if (p2sh?.[1] !== undefined) {
    return ok(Utils.toBase58Check(Utils.toArray(p2sh[1], 'hex'), [network.scriptHashPrefix]))
  }

  return err('Script has no address form')
}
