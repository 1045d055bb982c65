/**
 * Wallet
 *
 * Owns the ledger database, the master key keystores and the accounts
 * built on them, and exposes the key, transaction and balance operations
 * over them. Open one with {@link Wallet.open}.
 */

import { Hash, Utils } from '@bsv/sdk'
import type { LockingScript, PrivateKey, Transaction } from '@bsv/sdk'
import { KEYS, LEDGER, resolveWalletConfig } from '../../config'
import type { WalletConfig } from '../../config'
import { getNetwork } from '../../domain/networks'
import type { NetworkParams } from '../../domain/networks'
import type { KeyMaterial } from '../../domain/scripts/templates'
import { addressFor as renderAddress, scriptFor } from '../../domain/scripts/templates'
import { parseTransaction, toTransaction } from '../../domain/transaction/parsing'
import type {
  AccountKind,
  AccountRecord,
  AccountTransactionOutput,
  BlockHeaderInfo,
  DerivationPath,
  ImportOutcome,
  KeyInstance,
  KeySubscription,
  MissingTransactionEntry,
  ScriptType,
  TransactionLinkState,
  TransactionMetadata,
  TransactionOutputRecord,
  TransactionValue,
  WalletBalance
} from '../../domain/types'
import { createLinkState, isOk } from '../../domain/types'
import { encodePoint } from '../../domain/wallet/keyDerivation'
import {
  WalletDatabase,
  createAccounts,
  createMasterKey,
  readAccountKeyInstances,
  readAccounts,
  readBalance,
  readFreshKeyInstances,
  readKeyInstance,
  readKeysForTransactionSubscriptions,
  readMasterKeys,
  readTransactionData,
  readTransactionFlags,
  readTransactionHashes,
  readTransactionMetadata,
  readTransactionOutputsExplicit,
  readTransactionOutputsFull,
  readTransactionValues,
  readUnverifiedTransactions,
  readWatermark,
  setKeyInstanceDescription,
  setTransactionDescription,
  updateKeyInstanceDerivationData,
  updateMasterKeyDerivationData
} from '../../infrastructure/database'
import type { Account, DerivingAccount, ImportedAccount } from '../accounts'
import {
  accountKindFor,
  buildAccount,
  defaultScriptTypeFor,
  isImportedAccount,
  isImportedKind,
  withKeystore
} from '../accounts'
import { AsyncMutex, KeyedMutex, runTask } from '../cancellation'
import type { TaskHandle } from '../cancellation'
import {
  DeviceUnavailableError,
  IncompatibleWalletError,
  InvalidPasswordError,
  UnknownAccountError,
  UnknownKeyInstanceError
} from '../errors'
import type {
  DerivingKeyStore,
  HardwareKeyStore,
  ImportedKey,
  ImportedKeyStore,
  ImportedTextType,
  KeySignatures,
  KeyStore,
  SigningDevice
} from '../keystores'
import {
  checkPassword,
  describeKeystore,
  hardwarePathFor,
  importedKeyToDerivationData,
  importedKeysFromText,
  importedKeystoreFromKeyInstances,
  isWatchingOnly,
  keystoreDerivationType,
  keystoreFromMasterKey,
  keystoreToDerivationData,
  privateKeysFor,
  publicMaterialFor,
  reencryptKeystore
} from '../keystores'
import { walletLogger } from '../logger'
import { recordTransactionProof, revertVerifications } from './confirmations'
import { allocateKeys, createImportedKeys, deriveKeysUntil } from './keyRegistry'
import { linkTransaction, unlinkTransaction } from './linker'

export interface WalletOptions extends Partial<WalletConfig> {
  /** Signers for hardware accounts, by `hwType` */
  devices?: SigningDevice[]
}

export interface NewAccountEntry {
  kind: AccountKind
  accountName: string
  /** Required for standard, hardware and multisig accounts; null for imported */
  masterkeyId: number | null
  defaultScriptType?: ScriptType
}

function signaturePublicKey(key: PrivateKey, candidates: readonly string[]): string {
  const publicKey = key.toPublicKey()
  const compressed = encodePoint(publicKey, true)
  const uncompressed = encodePoint(publicKey, false)
  return candidates.find(candidate => candidate === compressed || candidate === uncompressed) ?? compressed
}

function materialPublicKeys(material: KeyMaterial): string[] {
  switch (material.kind) {
    case 'public_key':
      return [material.publicKey]
    case 'multisig':
      return material.publicKeys
    case 'public_key_hash':
      return []
  }
}

function signWith(key: PrivateKey, preimages: readonly number[][]): string[] {
  return preimages.map(preimage => {
    const der = key.sign(Hash.sha256(preimage)).toDER('hex')
    return typeof der === 'string' ? der : Utils.toHex(der)
  })
}

export class Wallet {
  private readonly keyAllocation = new KeyedMutex<string>()
  private readonly passwordMutex = new AsyncMutex()
  private readonly missingTransactions = new Map<string, MissingTransactionEntry>()
  private readonly devices = new Map<string, SigningDevice>()

  private constructor(
    private readonly db: WalletDatabase,
    readonly config: WalletConfig,
    readonly network: NetworkParams,
    private masterKeys: Map<number, DerivingKeyStore>,
    private accounts: Map<number, Account>
  ) {}

  /**
   * Open (creating when needed) a wallet ledger and load its keystores
   * and accounts
   */
  static async open(options: WalletOptions = {}): Promise<Wallet> {
    const { devices = [], ...overrides } = options
    const config = resolveWalletConfig(overrides)
    const db = await WalletDatabase.open({ path: config.databasePath })

    const masterKeys = new Map<number, DerivingKeyStore>()
    for (const record of await readMasterKeys(db)) {
      const keystore = keystoreFromMasterKey(record)
      if (keystore.type === 'imported') {
        throw new IncompatibleWalletError('Master key rows cannot hold imported keystores')
      }
      masterKeys.set(record.masterkeyId, keystore)
    }

    const accounts = new Map<number, Account>()
    for (const record of await readAccounts(db)) {
      let keystore: KeyStore | undefined
      if (isImportedKind(record.kind)) {
        keystore = importedKeystoreFromKeyInstances(await readAccountKeyInstances(db, record.accountId))
      } else if (record.defaultMasterkeyId !== null) {
        keystore = masterKeys.get(record.defaultMasterkeyId)
      }
      if (!keystore) {
        throw new IncompatibleWalletError(`Account ${record.accountId} has no keystore`, { accountId: record.accountId })
      }
      accounts.set(record.accountId, buildAccount(record, keystore))
    }

    const wallet = new Wallet(db, config, getNetwork(config.network), masterKeys, accounts)
    devices.forEach(device => wallet.registerSigningDevice(device))
    walletLogger.info('Wallet opened', {
      network: config.network,
      masterKeys: masterKeys.size,
      accounts: accounts.size
    })
    return wallet
  }

  async close(): Promise<void> {
    await this.db.close()
  }

  registerSigningDevice(device: SigningDevice): void {
    this.devices.set(device.hwType, device)
  }

  // ============================================
  // Accounts
  // ============================================

  /**
   * Persist a keystore as a master key and make it available to accounts
   */
  async createMasterKeyFromKeystore(keystore: DerivingKeyStore): Promise<number> {
    const record = await createMasterKey(this.db, {
      parentMasterkeyId: null,
      derivationType: keystoreDerivationType(keystore),
      derivationData: keystoreToDerivationData(keystore)
    })
    this.masterKeys.set(record.masterkeyId, keystore)
    walletLogger.info('Created master key', { masterkeyId: record.masterkeyId, keystore: describeKeystore(keystore) })
    return record.masterkeyId
  }

  /**
   * Persist account rows. They are not usable until registered.
   */
  async addAccounts(entries: NewAccountEntry[]): Promise<AccountRecord[]> {
    return createAccounts(this.db, entries.map(entry => ({
      kind: entry.kind,
      defaultMasterkeyId: entry.masterkeyId,
      defaultScriptType: entry.defaultScriptType ?? defaultScriptTypeFor(entry.kind),
      accountName: entry.accountName
    })))
  }

  /**
   * Attach a keystore to a persisted account row. Deriving accounts must use
   * the keystore registered for their master key; imported accounts bring
   * their own.
   */
  registerAccount(record: AccountRecord, keystore: KeyStore): Account {
    if (keystore.type !== 'imported') {
      const registered = record.defaultMasterkeyId === null ? undefined : this.masterKeys.get(record.defaultMasterkeyId)
      if (registered !== keystore) {
        throw new IncompatibleWalletError(
          `Account ${record.accountId} keystore is not the wallet's keystore for its master key`,
          { accountId: record.accountId, masterkeyId: record.defaultMasterkeyId }
        )
      }
    }
    const account = buildAccount(record, keystore)
    this.accounts.set(account.accountId, account)
    return account
  }

  /**
   * Master key, account row and registration for a deriving keystore
   */
  async createAccountFromKeystore(keystore: DerivingKeyStore, accountName?: string): Promise<Account> {
    const masterkeyId = await this.createMasterKeyFromKeystore(keystore)
    const kind = accountKindFor(keystore)
    const [record] = await this.addAccounts([{
      kind,
      accountName: accountName ?? `Account ${this.accounts.size + 1}`,
      masterkeyId
    }])
    if (!record) {
      throw new IncompatibleWalletError('Account row was not created')
    }
    return this.registerAccount(record, keystore)
  }

  /**
   * An imported account holding private keys (WIF) or watched addresses
   */
  async createAccountFromTextEntries(
    textType: ImportedTextType,
    entries: readonly string[],
    password: string,
    accountName?: string
  ): Promise<ImportedAccount> {
    const keys = await importedKeysFromText(textType, entries, password, this.network, this.config.kdfIterations)
    const kind = textType === 'private_keys' ? 'imported_privkey' : 'imported_address'
    const [record] = await this.addAccounts([{
      kind,
      accountName: accountName ?? `Imported ${this.accounts.size + 1}`,
      masterkeyId: null
    }])
    if (!record) {
      throw new IncompatibleWalletError('Account row was not created')
    }
    const account = this.registerAccount(record, { type: 'imported', keys: new Map<number, ImportedKey>() })
    if (!isImportedAccount(account)) {
      throw new IncompatibleWalletError(`Account ${record.accountId} is not an imported account`)
    }
    await createImportedKeys(this.db, account, keys)
    return account
  }

  getAccounts(): Account[] {
    return [...this.accounts.values()].sort((a, b) => a.accountId - b.accountId)
  }

  getAccount(accountId: number): Account {
    const account = this.accounts.get(accountId)
    if (!account) throw new UnknownAccountError(accountId)
    return account
  }

  /**
   * Master key keystores in creation order
   */
  getKeystores(): DerivingKeyStore[] {
    return [...this.masterKeys.entries()].sort(([a], [b]) => a - b).map(([, keystore]) => keystore)
  }

  getKeystore(masterkeyId: number): DerivingKeyStore {
    const keystore = this.masterKeys.get(masterkeyId)
    if (!keystore) {
      throw new IncompatibleWalletError(`No keystore for master key ${masterkeyId}`, { masterkeyId })
    }
    return keystore
  }

  // ============================================
  // Keys
  // ============================================

  private derivingAccount(accountId: number): DerivingAccount {
    const account = this.getAccount(accountId)
    if (isImportedAccount(account)) {
      throw new IncompatibleWalletError('Imported accounts do not derive keys by path', { accountId })
    }
    return account
  }

  private allocationLock(accountId: number, prefix: DerivationPath): AsyncMutex {
    return this.keyAllocation.get(`${accountId}:${prefix.join('/')}`)
  }

  /**
   * Allocate `count` new keys under `prefix`
   */
  async allocateKeys(accountId: number, prefix: DerivationPath, count: number): Promise<KeyInstance[]> {
    const account = this.derivingAccount(accountId)
    return this.allocationLock(accountId, prefix).run(() => allocateKeys(this.db, account, prefix, count))
  }

  /**
   * Allocate every key up to and including `path`
   */
  async deriveUntil(accountId: number, path: DerivationPath): Promise<KeyInstance[]> {
    const account = this.derivingAccount(accountId)
    return this.allocationLock(accountId, path.slice(0, -1)).run(() => deriveKeysUntil(this.db, account, path))
  }

  async getNextDerivationIndex(accountId: number, prefix: DerivationPath): Promise<number> {
    const account = this.derivingAccount(accountId)
    return readWatermark(this.db, accountId, account.masterkeyId, prefix)
  }

  /**
   * Unused keys under `prefix`, oldest first
   */
  async getExistingFreshKeys(accountId: number, prefix: DerivationPath, limit: number): Promise<KeyInstance[]> {
    const account = this.derivingAccount(accountId)
    return readFreshKeyInstances(this.db, accountId, account.masterkeyId, prefix, limit)
  }

  /**
   * `count` unused keys under `prefix`, allocating more when too few exist
   */
  async getFreshKeys(accountId: number, prefix: DerivationPath, count: number): Promise<KeyInstance[]> {
    const account = this.derivingAccount(accountId)
    return this.allocationLock(accountId, prefix).run(async () => {
      const existing = await readFreshKeyInstances(this.db, accountId, account.masterkeyId, prefix, count)
      if (existing.length >= count) return existing
      const created = await allocateKeys(this.db, account, prefix, count - existing.length)
      return [...existing, ...created]
    })
  }

  /**
   * Keep the configured gap of unused receiving and change keys
   */
  async topUpKeys(accountId: number): Promise<KeyInstance[]> {
    const receiving = await this.getFreshKeys(accountId, KEYS.RECEIVING_SUBPATH, this.config.receivingGap)
    const change = await this.getFreshKeys(accountId, KEYS.CHANGE_SUBPATH, this.config.changeGap)
    return [...receiving, ...change]
  }

  async getKeyInstance(keyinstanceId: number): Promise<KeyInstance> {
    const instance = await readKeyInstance(this.db, keyinstanceId)
    if (!instance) throw new UnknownKeyInstanceError(keyinstanceId)
    return instance
  }

  async getAccountKeyInstances(accountId: number): Promise<KeyInstance[]> {
    this.getAccount(accountId)
    return readAccountKeyInstances(this.db, accountId)
  }

  async setKeyInstanceDescription(keyinstanceId: number, description: string | null): Promise<void> {
    if (!await setKeyInstanceDescription(this.db, keyinstanceId, description)) {
      throw new UnknownKeyInstanceError(keyinstanceId)
    }
  }

  /**
   * Locking script for a key, under its default script type unless one is given
   *
   * @throws IncompatibleWalletError for `NONE` and script types the key cannot produce
   */
  async getScript(keyinstanceId: number, scriptType?: ScriptType): Promise<LockingScript> {
    const instance = await this.getKeyInstance(keyinstanceId)
    const account = this.getAccount(instance.accountId)
    const type = scriptType ?? instance.scriptType
    const script = scriptFor(publicMaterialFor(account.keystore, instance), type)
    if (!isOk(script)) {
      throw new IncompatibleWalletError(script.error, { keyinstanceId, scriptType: type })
    }
    return script.value
  }

  async getAddress(keyinstanceId: number, scriptType?: ScriptType): Promise<string> {
    const script = await this.getScript(keyinstanceId, scriptType)
    const address = renderAddress(script, this.network)
    if (!isOk(address)) {
      throw new IncompatibleWalletError(address.error, { keyinstanceId })
    }
    return address.value
  }

  // ============================================
  // Transactions
  // ============================================

  /**
   * Record block metadata for a transaction whose body has not arrived yet
   */
  addMissingTransaction(txHash: string, entry: MissingTransactionEntry): void {
    this.missingTransactions.set(txHash, entry)
  }

  getMissingTransactions(): Map<string, MissingTransactionEntry> {
    return new Map(this.missingTransactions)
  }

  /**
   * Import and link a transaction. `flags` names its initial state.
   */
  importTransaction(
    source: Transaction | string | number[],
    flags: number,
    linkState: TransactionLinkState = createLinkState()
  ): TaskHandle<ImportOutcome> {
    return runTask('import transaction', async token => {
      const parsed = parseTransaction(source)
      const missing = this.missingTransactions.get(parsed.txHash)
      const outcome = await linkTransaction(this.db, { parsed, flags, missing, linkState, token })
      if (outcome.inserted && missing) {
        this.missingTransactions.delete(parsed.txHash)
      }
      return outcome
    })
  }

  async addTransactionProof(
    txHash: string,
    blockHeight: number,
    header: BlockHeaderInfo,
    blockPosition: number,
    proofIndex: number,
    proofHashes: string[]
  ): Promise<void> {
    await recordTransactionProof(this.db, {
      txHash,
      blockHeight,
      header,
      blockPosition,
      proofIndex,
      proofHashes,
      missing: this.missingTransactions.get(txHash)
    })
    this.missingTransactions.delete(txHash)
  }

  /**
   * Revert settled transactions at or above `height`; returns their hashes
   */
  async undoVerifications(height: number): Promise<string[]> {
    return revertVerifications(this.db, height)
  }

  async removeTransaction(txHash: string): Promise<void> {
    await unlinkTransaction(this.db, txHash)
  }

  async getUnverifiedTransactions(localHeight: number): Promise<Map<string, number>> {
    return readUnverifiedTransactions(this.db, localHeight)
  }

  async getTransactionFlags(txHash: string): Promise<number | null> {
    return readTransactionFlags(this.db, txHash)
  }

  async getTransactionMetadata(txHash: string): Promise<TransactionMetadata | null> {
    return readTransactionMetadata(this.db, txHash)
  }

  async getTransactionBytes(txHash: string): Promise<number[] | null> {
    const data = await readTransactionData(this.db, txHash)
    return data === null ? null : toTransaction(data).toBinary()
  }

  async getTransaction(txHash: string): Promise<Transaction | null> {
    const data = await readTransactionData(this.db, txHash)
    return data === null ? null : toTransaction(data)
  }

  async getTransactionHashes(accountId?: number): Promise<string[]> {
    return readTransactionHashes(this.db, accountId)
  }

  async getTransactionValues(txHash: string, accountId?: number): Promise<TransactionValue[]> {
    return readTransactionValues(this.db, txHash, accountId)
  }

  async getTransactionOutputsFull(txHash: string): Promise<TransactionOutputRecord[]> {
    return readTransactionOutputsFull(this.db, txHash)
  }

  async getTransactionOutputsExplicit(txHash: string): Promise<AccountTransactionOutput[]> {
    return readTransactionOutputsExplicit(this.db, txHash)
  }

  async getKeysForTransactionSubscriptions(accountId: number, txHash?: string): Promise<KeySubscription[]> {
    return readKeysForTransactionSubscriptions(this.db, accountId, txHash)
  }

  async setTransactionDescription(txHash: string, description: string | null): Promise<boolean> {
    return setTransactionDescription(this.db, txHash, description)
  }

  // ============================================
  // Balances
  // ============================================

  async getBalance(localHeight: number): Promise<WalletBalance> {
    return readBalance(this.db, localHeight, LEDGER.COINBASE_MATURITY)
  }

  async getAccountBalance(accountId: number, localHeight: number): Promise<WalletBalance> {
    this.getAccount(accountId)
    return readBalance(this.db, localHeight, LEDGER.COINBASE_MATURITY, accountId)
  }

  // ============================================
  // Secrets
  // ============================================

  /**
   * Re-encrypt every secret under a new password in one write unit.
   * Nothing changes unless `oldPassword` opens every keystore.
   */
  updatePassword(oldPassword: string, newPassword: string): TaskHandle<void> {
    return runTask('update password', token => this.passwordMutex.run(async () => {
      const keystores: KeyStore[] = [
        ...this.masterKeys.values(),
        ...this.getAccounts().filter(isImportedAccount).map(account => account.keystore)
      ]
      for (const keystore of keystores) {
        await checkPassword(keystore, oldPassword)
      }

      const iterations = this.config.kdfIterations
      const masterKeys = new Map<number, DerivingKeyStore>()
      for (const [masterkeyId, keystore] of this.masterKeys) {
        const updated = await reencryptKeystore(keystore, oldPassword, newPassword, iterations)
        if (updated.type === 'imported') {
          throw new IncompatibleWalletError('Master key keystore changed type during re-encryption')
        }
        masterKeys.set(masterkeyId, updated)
      }
      const importedKeystores = new Map<number, ImportedKeyStore>()
      for (const account of this.getAccounts().filter(isImportedAccount)) {
        const updated = await reencryptKeystore(account.keystore, oldPassword, newPassword, iterations)
        if (updated.type !== 'imported') {
          throw new IncompatibleWalletError('Imported keystore changed type during re-encryption')
        }
        importedKeystores.set(account.accountId, updated)
      }

      await this.db.withTransaction(async scope => {
        for (const [masterkeyId, keystore] of masterKeys) {
          await updateMasterKeyDerivationData(scope, masterkeyId, keystoreToDerivationData(keystore))
        }
        for (const keystore of importedKeystores.values()) {
          for (const [keyinstanceId, key] of keystore.keys) {
            await updateKeyInstanceDerivationData(scope, keyinstanceId, importedKeyToDerivationData(key))
          }
        }
        token.throwIfCancelled()
      })

      const accounts = new Map<number, Account>()
      for (const account of this.accounts.values()) {
        const keystore = isImportedAccount(account)
          ? importedKeystores.get(account.accountId)
          : masterKeys.get(account.masterkeyId)
        accounts.set(account.accountId, keystore ? withKeystore(account, keystore) : account)
      }
      this.masterKeys = masterKeys
      this.accounts = accounts
      walletLogger.info('Password updated', { keystores: keystores.length })
    }))
  }

  /**
   * Sign sha256d(preimage) for each preimage with the key instance's key(s).
   * Hardware accounts delegate to their signing device.
   */
  async signPreimages(
    accountId: number,
    keyinstanceId: number,
    preimages: number[][],
    password?: string
  ): Promise<KeySignatures[]> {
    const account = this.getAccount(accountId)
    const instance = await this.getKeyInstance(keyinstanceId)
    if (instance.accountId !== accountId) {
      throw new UnknownKeyInstanceError(keyinstanceId)
    }
    const material = publicMaterialFor(account.keystore, instance)

    if (account.kind === 'hardware') {
      return [{
        publicKey: materialPublicKeys(material)[0] ?? '',
        signatures: await this.signWithDevice(account.keystore, instance, preimages)
      }]
    }
    if (isWatchingOnly(account.keystore)) {
      throw new IncompatibleWalletError('Watch-only keystores cannot sign', { accountId })
    }
    if (password === undefined) {
      throw new InvalidPasswordError({ reason: 'password required to sign' })
    }

    const keys = await privateKeysFor(account.keystore, instance, password)
    return keys.map(key => ({
      publicKey: signaturePublicKey(key, materialPublicKeys(material)),
      signatures: signWith(key, preimages)
    }))
  }

  private async signWithDevice(
    keystore: HardwareKeyStore,
    instance: KeyInstance,
    preimages: number[][]
  ): Promise<string[]> {
    const device = this.devices.get(keystore.hwType)
    if (!device) {
      throw new DeviceUnavailableError(keystore.hwType)
    }
    try {
      return await device.sign(hardwarePathFor(keystore, instance), preimages)
    } catch (error) {
      walletLogger.error('Signing device failed', error, { hwType: keystore.hwType })
      throw new DeviceUnavailableError(keystore.hwType, error)
    }
  }
}
