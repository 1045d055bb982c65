/**
 * Accounts
 *
 * An account pairs an account row with the keystore its keys come from.
 * Standard, hardware and multisig accounts share the wallet's master key
 * keystores; imported accounts own theirs.
 */

import type { AccountKind, AccountRecord, KeyDerivationType, ScriptType } from '../domain/types'
import { IncompatibleWalletError } from './errors'
import type {
  Bip32KeyStore,
  HardwareKeyStore,
  ImportedKeyStore,
  KeyStore,
  MultisigKeyStore,
  OldKeyStore
} from './keystores'

interface AccountBase {
  accountId: number
  accountName: string
  defaultScriptType: ScriptType
}

export interface StandardAccount extends AccountBase {
  kind: 'standard'
  masterkeyId: number
  keystore: Bip32KeyStore | OldKeyStore
}

export interface HardwareAccount extends AccountBase {
  kind: 'hardware'
  masterkeyId: number
  keystore: HardwareKeyStore
}

export interface MultisigAccount extends AccountBase {
  kind: 'multisig'
  masterkeyId: number
  keystore: MultisigKeyStore
}

export interface ImportedAccount extends AccountBase {
  kind: 'imported_privkey' | 'imported_address'
  masterkeyId: null
  keystore: ImportedKeyStore
}

export type Account = StandardAccount | HardwareAccount | MultisigAccount | ImportedAccount

/** Accounts that derive keys by path from a master key */
export type DerivingAccount = StandardAccount | HardwareAccount | MultisigAccount

export function isImportedAccount(account: Account): account is ImportedAccount {
  return account.kind === 'imported_privkey' || account.kind === 'imported_address'
}

export function isImportedKind(kind: AccountKind): kind is ImportedAccount['kind'] {
  return kind === 'imported_privkey' || kind === 'imported_address'
}

/**
 * Scripts registered for every key of an account, so an output paying
 * any of them is matched
 */
export function accountScriptTypes(kind: AccountKind): readonly ScriptType[] {
  switch (kind) {
    case 'standard':
    case 'hardware':
    case 'imported_privkey':
      return ['P2PKH', 'P2PK']
    case 'imported_address':
      return ['P2PKH']
    case 'multisig':
      return ['MULTISIG_BARE', 'MULTISIG_P2SH']
  }
}

export function defaultScriptTypeFor(kind: AccountKind): ScriptType {
  return kind === 'multisig' ? 'MULTISIG_P2SH' : 'P2PKH'
}

/**
 * Account kind a master key keystore is used as
 */
export function accountKindFor(keystore: KeyStore): AccountKind {
  switch (keystore.type) {
    case 'bip32':
    case 'electrum_old':
      return 'standard'
    case 'hardware':
      return 'hardware'
    case 'multisig':
      return 'multisig'
    case 'imported':
      throw new IncompatibleWalletError('Imported keystores need an explicit account kind')
  }
}

export function keyDerivationTypeFor(account: Account): KeyDerivationType {
  switch (account.kind) {
    case 'standard':
      return account.keystore.type === 'electrum_old' ? 'ELECTRUM_OLD_SUBPATH' : 'BIP32_SUBPATH'
    case 'hardware':
    case 'multisig':
      return 'BIP32_SUBPATH'
    case 'imported_privkey':
      return 'PRIVATE_KEY'
    case 'imported_address':
      return 'PUBLIC_KEY_HASH'
  }
}

function mismatch(record: AccountRecord, keystore: KeyStore): IncompatibleWalletError {
  return new IncompatibleWalletError(
    `A ${keystore.type} keystore cannot back a ${record.kind} account`,
    { accountId: record.accountId, kind: record.kind, keystore: keystore.type }
  )
}

function requireMasterkeyId(record: AccountRecord): number {
  if (record.defaultMasterkeyId === null) {
    throw new IncompatibleWalletError(`A ${record.kind} account needs a master key`, { accountId: record.accountId })
  }
  return record.defaultMasterkeyId
}

/**
 * Pair an account row with its keystore, checking the kind matches
 */
export function buildAccount(record: AccountRecord, keystore: KeyStore): Account {
  const base: AccountBase = {
    accountId: record.accountId,
    accountName: record.accountName,
    defaultScriptType: record.defaultScriptType
  }

  switch (record.kind) {
    case 'standard':
      if (keystore.type !== 'bip32' && keystore.type !== 'electrum_old') throw mismatch(record, keystore)
      return { ...base, kind: 'standard', masterkeyId: requireMasterkeyId(record), keystore }
    case 'hardware':
      if (keystore.type !== 'hardware') throw mismatch(record, keystore)
      return { ...base, kind: 'hardware', masterkeyId: requireMasterkeyId(record), keystore }
    case 'multisig':
      if (keystore.type !== 'multisig') throw mismatch(record, keystore)
      return { ...base, kind: 'multisig', masterkeyId: requireMasterkeyId(record), keystore }
    case 'imported_privkey':
    case 'imported_address':
      if (keystore.type !== 'imported') throw mismatch(record, keystore)
      if (record.defaultMasterkeyId !== null) {
        throw new IncompatibleWalletError('Imported accounts have no master key', { accountId: record.accountId })
      }
      return { ...base, kind: record.kind, masterkeyId: null, keystore }
  }
}

/**
 * The same account backed by a replacement keystore of the same shape
 */
export function withKeystore(account: Account, keystore: KeyStore): Account {
  return buildAccount(
    {
      accountId: account.accountId,
      kind: account.kind,
      defaultMasterkeyId: account.masterkeyId,
      defaultScriptType: account.defaultScriptType,
      accountName: account.accountName
    },
    keystore
  )
}
