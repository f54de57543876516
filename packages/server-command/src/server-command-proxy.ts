/**
 * @fileoverview Server command proxy
 *
 * Typed client for the Application Server's remote command API. Every
 * method takes the server's auth token first and forwards its arguments in
 * the server's positional order. Omitted optional values travel as `<nil/>`
 * so the server applies its own defaults.
 *
 * Construction performs no I/O. The connection opens on `open()` or on the
 * first call, and stays open until `close()`.
 */

import { createLogger, withLoggingContext, type PaperkitLogger } from '@paperkit/core';
import { decode, type ResultDecoder, type TaskStatus } from './decoders.js';
import { resolveEndpoint } from './endpoint.js';
import { createXmlRpcTransport } from './transport/xmlrpc-transport.js';
import type { ServerCommandTransport, TransportFactory } from './transport/types.js';
import {
  asDouble,
  type OverdraftMode,
  type PropertyAssignment,
  type QuotaPeriod,
  type ServerConnectionOptions,
  type ServerEndpoint,
  type Snmpv3Credentials,
  type StandardPopupSelection,
  type XmlRpcParam,
  type XmlRpcStruct,
  type XmlRpcValue,
} from './types.js';

// =============================================================================
// Options
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_LIMIT = 1000;

export interface ServerCommandProxyOptions extends ServerConnectionOptions {
  /** Log every request and response at info level (auth token redacted) */
  verbose?: boolean;
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
  /** Verify the server certificate over HTTPS (default: true) */
  rejectUnauthorized?: boolean;
  transportFactory?: TransportFactory;
  logger?: PaperkitLogger;
}

/** Names of the remote methods the proxy exposes */
export type ServerCommandMethod = {
  [K in keyof ServerCommandProxy]: ServerCommandProxy[K] extends (authToken: string, ...args: never[]) => Promise<unknown>
    ? K
    : never;
}[keyof ServerCommandProxy];

const REDACTED = '[redacted]';

function toPairs(value: PropertyAssignment[]): XmlRpcValue[] {
  return value.map(([name, propertyValue]) => [name, propertyValue]);
}

function orderSnmpv3(credentials: Snmpv3Credentials): XmlRpcParam[] {
  return [
    credentials.context,
    credentials.userName,
    credentials.authPass,
    credentials.privPass,
    credentials.authProto,
    credentials.privProto,
  ];
}

// =============================================================================
// ServerCommandProxy
// =============================================================================

export class ServerCommandProxy {
  readonly endpoint: ServerEndpoint;
  private readonly verbose: boolean;
  private readonly timeoutMs: number;
  private readonly rejectUnauthorized: boolean;
  private readonly transportFactory: TransportFactory;
  private readonly logger: PaperkitLogger;
  private transport: ServerCommandTransport | null = null;

  constructor(options: ServerCommandProxyOptions = {}) {
    this.endpoint = resolveEndpoint(options);
    this.verbose = options.verbose ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rejectUnauthorized = options.rejectUnauthorized ?? true;
    this.transportFactory = options.transportFactory ?? createXmlRpcTransport;
    this.logger = options.logger ?? createLogger('server-command');
  }

  get isOpen(): boolean {
    return this.transport !== null;
  }

  /**
   * Open the connection. Opening an open proxy is a no-op.
   */
  open(): this {
    this.acquire();
    return this;
  }

  private acquire(): ServerCommandTransport {
    if (!this.transport) {
      this.transport = this.transportFactory(this.endpoint, {
        timeoutMs: this.timeoutMs,
        rejectUnauthorized: this.rejectUnauthorized,
      });
      this.logger.debug('Connection opened', { url: this.endpoint.url });
    }
    return this.transport;
  }

  /**
   * Release the connection. Safe to call more than once.
   */
  close(): void {
    if (!this.transport) return;
    const transport = this.transport;
    this.transport = null;
    transport.close();
    this.logger.debug('Connection closed', { url: this.endpoint.url });
  }

  private async invoke<T>(method: ServerCommandMethod, params: XmlRpcParam[], decoder: ResultDecoder<T>): Promise<T> {
    const transport = this.acquire();
    const wire = params.map((param): XmlRpcValue => (param === undefined ? null : param));

    return withLoggingContext({ method }, async () => {
      if (this.verbose) {
        this.logger.info('XML-RPC request', { params: [REDACTED, ...wire.slice(1)] });
      }
      const done = this.logger.startTimer(`XML-RPC ${method}`);
      let raw: unknown;
      try {
        raw = await transport.call(method, wire);
      } catch (error) {
        this.logger.debug('XML-RPC call failed', { err: error });
        throw error;
      }
      done();
      if (this.verbose) {
        this.logger.info('XML-RPC response', { result: raw });
      }
      return decoder(method, raw);
    });
  }

  // ===========================================================================
  // Users
  // ===========================================================================

  /** Import a single user from the configured user directory */
  addNewUser(authToken: string, userName: string): Promise<void> {
    return this.invoke('addNewUser', [authToken, userName], decode.none);
  }

  /** Import every new user from the configured user directory */
  addNewUsers(authToken: string): Promise<void> {
    return this.invoke('addNewUsers', [authToken], decode.none);
  }

  /**
   * Create an internal user, who is managed by the server rather than the
   * user directory.
   */
  addNewInternalUser(
    authToken: string,
    userName: string,
    password: string,
    fullName?: string,
    email?: string,
    cardId?: string,
    pin?: string
  ): Promise<void> {
    return this.invoke(
      'addNewInternalUser',
      [authToken, userName, password, fullName, email, cardId, pin],
      decode.none
    );
  }

  isUserExists(authToken: string, userName: string): Promise<boolean> {
    return this.invoke('isUserExists', [authToken, userName], decode.boolean);
  }

  /**
   * Delete a user. With `redactUserData` the user's name is also scrubbed
   * from historical records.
   */
  deleteExistingUser(authToken: string, userName: string, redactUserData = false): Promise<void> {
    return this.invoke('deleteExistingUser', [authToken, userName, redactUserData], decode.none);
  }

  renameUserAccount(authToken: string, currentUserName: string, newUserName: string): Promise<void> {
    return this.invoke('renameUserAccount', [authToken, currentUserName, newUserName], decode.none);
  }

  getTotalUsers(authToken: string): Promise<number> {
    return this.invoke('getTotalUsers', [authToken], decode.number);
  }

  /** List user names in ascending order, a page at a time */
  listUserAccounts(authToken: string, offset = 0, limit = DEFAULT_LIMIT): Promise<string[]> {
    return this.invoke('listUserAccounts', [authToken, offset, limit], decode.stringList);
  }

  /**
   * Balance of a user's personal account, or of one of the user's named
   * accounts when multiple personal accounts are enabled.
   */
  getUserAccountBalance(authToken: string, userName: string, accountName?: string): Promise<number> {
    return this.invoke('getUserAccountBalance', [authToken, userName, accountName], decode.number);
  }

  getUserGroups(authToken: string, userName: string): Promise<string[]> {
    return this.invoke('getUserGroups', [authToken, userName], decode.stringList);
  }

  getUserProperty(authToken: string, userName: string, propertyName: string): Promise<string> {
    return this.invoke('getUserProperty', [authToken, userName, propertyName], decode.string);
  }

  /** Values come back in the order the property names were given */
  getUserProperties(authToken: string, userName: string, propertyNames: string[]): Promise<string[]> {
    return this.invoke('getUserProperties', [authToken, userName, propertyNames], decode.stringList);
  }

  setUserProperty(authToken: string, userName: string, propertyName: string, propertyValue: string): Promise<void> {
    return this.invoke('setUserProperty', [authToken, userName, propertyName, propertyValue], decode.none);
  }

  setUserProperties(authToken: string, userName: string, propertyNamesAndValues: PropertyAssignment[]): Promise<void> {
    return this.invoke(
      'setUserProperties',
      [authToken, userName, toPairs(propertyNamesAndValues)],
      decode.none
    );
  }

  getUserOverdraftMode(authToken: string, userName: string): Promise<string> {
    return this.invoke('getUserOverdraftMode', [authToken, userName], decode.string);
  }

  setUserOverdraftMode(authToken: string, userName: string, mode: OverdraftMode): Promise<void> {
    return this.invoke('setUserOverdraftMode', [authToken, userName, mode], decode.none);
  }

  adjustUserAccountBalance(
    authToken: string,
    userName: string,
    adjustment: number,
    comment?: string,
    accountName?: string
  ): Promise<void> {
    return this.invoke(
      'adjustUserAccountBalance',
      [authToken, userName, asDouble(adjustment), comment, accountName],
      decode.none
    );
  }

  /** Resolves false when no user holds the card */
  adjustUserAccountBalanceByCardNumber(
    authToken: string,
    cardNumber: string,
    adjustment: number,
    comment?: string,
    accountName?: string
  ): Promise<boolean> {
    return this.invoke(
      'adjustUserAccountBalanceByCardNumber',
      [authToken, cardNumber, asDouble(adjustment), comment, accountName],
      decode.boolean
    );
  }

  adjustUserAccountBalanceByGroup(
    authToken: string,
    group: string,
    adjustment: number,
    comment?: string,
    accountName?: string
  ): Promise<void> {
    return this.invoke(
      'adjustUserAccountBalanceByGroup',
      [authToken, group, asDouble(adjustment), comment, accountName],
      decode.none
    );
  }

  /** Adjust each member's balance without taking it past `limit` */
  adjustUserAccountBalanceByGroupUpTo(
    authToken: string,
    group: string,
    adjustment: number,
    limit: number,
    comment?: string,
    accountName?: string
  ): Promise<void> {
    return this.invoke(
      'adjustUserAccountBalanceByGroupUpTo',
      [authToken, group, asDouble(adjustment), asDouble(limit), comment, accountName],
      decode.none
    );
  }

  /** Resolves false when the balance does not cover the adjustment */
  adjustUserAccountBalanceIfAvailable(
    authToken: string,
    userName: string,
    adjustment: number,
    comment?: string
  ): Promise<boolean> {
    return this.invoke(
      'adjustUserAccountBalanceIfAvailable',
      [authToken, userName, asDouble(adjustment), comment],
      decode.boolean
    );
  }

  adjustUserAccountBalanceIfAvailableLeaveRemaining(
    authToken: string,
    userName: string,
    adjustment: number,
    leaveRemaining: number,
    comment?: string,
    accountName?: string
  ): Promise<boolean> {
    return this.invoke(
      'adjustUserAccountBalanceIfAvailableLeaveRemaining',
      [authToken, userName, asDouble(adjustment), asDouble(leaveRemaining), comment, accountName],
      decode.boolean
    );
  }

  setUserAccountBalance(
    authToken: string,
    userName: string,
    balance: number,
    comment?: string,
    accountName?: string
  ): Promise<void> {
    return this.invoke(
      'setUserAccountBalance',
      [authToken, userName, asDouble(balance), comment, accountName],
      decode.none
    );
  }

  setUserAccountBalanceByGroup(
    authToken: string,
    group: string,
    balance: number,
    comment?: string,
    accountName?: string
  ): Promise<void> {
    return this.invoke(
      'setUserAccountBalanceByGroup',
      [authToken, group, asDouble(balance), comment, accountName],
      decode.none
    );
  }

  /** Redeem a top-up card; resolves with the server's outcome message */
  useCard(authToken: string, userName: string, cardNumber: string): Promise<string> {
    return this.invoke('useCard', [authToken, userName, cardNumber], decode.string);
  }

  disablePrintingForUser(authToken: string, userName: string, disableMins: number): Promise<void> {
    return this.invoke('disablePrintingForUser', [authToken, userName, disableMins], decode.none);
  }

  resetUserCounts(authToken: string, userName: string, resetBy: string): Promise<void> {
    return this.invoke('resetUserCounts', [authToken, userName, resetBy], decode.none);
  }

  reapplyInitialUserSettings(authToken: string, userName: string): Promise<void> {
    return this.invoke('reapplyInitialUserSettings', [authToken, userName], decode.none);
  }

  clearUserAdvancedPrinterSettings(authToken: string, userName: string): Promise<void> {
    return this.invoke('clearUserAdvancedPrinterSettings', [authToken, userName], decode.none);
  }

  /** Write the user's history export to a path on the server */
  exportUserDataHistory(authToken: string, userName: string, saveLocation: string): Promise<void> {
    return this.invoke('exportUserDataHistory', [authToken, userName, saveLocation], decode.none);
  }

  lookUpUserNameByCardNo(authToken: string, cardNo: string): Promise<string> {
    return this.invoke('lookUpUserNameByCardNo', [authToken, cardNo], decode.string);
  }

  lookUpUserNameByEmail(authToken: string, email: string): Promise<string> {
    return this.invoke('lookUpUserNameByEmail', [authToken, email], decode.string);
  }

  lookUpUserNameByIDNo(authToken: string, idNo: string): Promise<string> {
    return this.invoke('lookUpUserNameByIDNo', [authToken, idNo], decode.string);
  }

  lookUpUserNameBySecondaryUserName(authToken: string, secondaryUserName: string): Promise<string> {
    return this.invoke('lookUpUserNameBySecondaryUserName', [authToken, secondaryUserName], decode.string);
  }

  lookUpUsersByFullName(authToken: string, fullName: string): Promise<string[]> {
    return this.invoke('lookUpUsersByFullName', [authToken, fullName], decode.stringList);
  }

  setUserAccountSelectionAdvancedPopup(
    authToken: string,
    userName: string,
    allowPersonal = false,
    chargeToPersonalWhenSharedSelected = false,
    defaultSharedAccount?: string
  ): Promise<void> {
    return this.invoke(
      'setUserAccountSelectionAdvancedPopup',
      [authToken, userName, allowPersonal, chargeToPersonalWhenSharedSelected, defaultSharedAccount],
      decode.none
    );
  }

  setUserAccountSelectionAutoChargePersonal(
    authToken: string,
    userName: string,
    withPopupConfirmation: boolean
  ): Promise<void> {
    return this.invoke(
      'setUserAccountSelectionAutoChargePersonal',
      [authToken, userName, withPopupConfirmation],
      decode.none
    );
  }

  setUserAccountSelectionAutoSelectSharedAccount(
    authToken: string,
    userName: string,
    accountName: string,
    chargeToPersonal: boolean
  ): Promise<void> {
    return this.invoke(
      'setUserAccountSelectionAutoSelectSharedAccount',
      [authToken, userName, accountName, chargeToPersonal],
      decode.none
    );
  }

  setUserAccountSelectionStandardPopup(
    authToken: string,
    userName: string,
    selection: StandardPopupSelection
  ): Promise<void> {
    return this.invoke(
      'setUserAccountSelectionStandardPopup',
      [
        authToken,
        userName,
        selection.allowPersonal,
        selection.allowListSelection,
        selection.allowPinCode,
        selection.allowPrintingAsOtherUser,
        selection.chargeToPersonalWhenSharedSelected,
        selection.defaultSharedAccount,
      ],
      decode.none
    );
  }

  /** Shared accounts the user may charge to */
  listUserSharedAccounts(
    authToken: string,
    userName: string,
    offset = 0,
    limit = DEFAULT_LIMIT,
    ignoreAccountMode = false
  ): Promise<string[]> {
    return this.invoke(
      'listUserSharedAccounts',
      [authToken, userName, offset, limit, ignoreAccountMode],
      decode.stringList
    );
  }

  addAdminAccessUser(authToken: string, userName: string): Promise<void> {
    return this.invoke('addAdminAccessUser', [authToken, userName], decode.none);
  }

  removeAdminAccessUser(authToken: string, userName: string): Promise<void> {
    return this.invoke('removeAdminAccessUser', [authToken, userName], decode.none);
  }

  /** Import users from a tab-delimited file on the server */
  batchImportUsers(authToken: string, importFile: string, createNewUsers: boolean): Promise<void> {
    return this.invoke('batchImportUsers', [authToken, importFile, createNewUsers], decode.none);
  }

  batchImportInternalUsers(
    authToken: string,
    importFile: string,
    overwriteExistingPasswords = false,
    overwriteExistingPINs = false,
    emailUserOnCreation = false
  ): Promise<void> {
    return this.invoke(
      'batchImportInternalUsers',
      [authToken, importFile, overwriteExistingPasswords, overwriteExistingPINs, emailUserOnCreation],
      decode.none
    );
  }

  batchImportUserCardIdNumbers(authToken: string, importFile: string, overwriteExistingPINs = false): Promise<void> {
    return this.invoke('batchImportUserCardIdNumbers', [authToken, importFile, overwriteExistingPINs], decode.none);
  }

  // ===========================================================================
  // Groups
  // ===========================================================================

  addNewGroup(authToken: string, groupName: string): Promise<void> {
    return this.invoke('addNewGroup', [authToken, groupName], decode.none);
  }

  removeGroup(authToken: string, groupName: string): Promise<void> {
    return this.invoke('removeGroup', [authToken, groupName], decode.none);
  }

  isGroupExists(authToken: string, groupName: string): Promise<boolean> {
    return this.invoke('isGroupExists', [authToken, groupName], decode.boolean);
  }

  /** Resolves false when the group is unknown to the user directory */
  syncGroup(authToken: string, groupName: string): Promise<boolean> {
    return this.invoke('syncGroup', [authToken, groupName], decode.boolean);
  }

  listUserGroups(authToken: string, offset = 0, limit = DEFAULT_LIMIT): Promise<string[]> {
    return this.invoke('listUserGroups', [authToken, offset, limit], decode.stringList);
  }

  getGroupMembers(authToken: string, groupName: string, offset = 0, limit = DEFAULT_LIMIT): Promise<string[]> {
    return this.invoke('getGroupMembers', [authToken, groupName, offset, limit], decode.stringList);
  }

  addUserToGroup(authToken: string, userName: string, groupName: string): Promise<void> {
    return this.invoke('addUserToGroup', [authToken, userName, groupName], decode.none);
  }

  removeUserFromGroup(authToken: string, userName: string, groupName: string): Promise<void> {
    return this.invoke('removeUserFromGroup', [authToken, userName, groupName], decode.none);
  }

  getGroupQuota(authToken: string, groupName: string): Promise<XmlRpcStruct> {
    return this.invoke('getGroupQuota', [authToken, groupName], decode.struct);
  }

  /**
   * Set a group's periodic quota. The server takes the period before the
   * maximum accumulation.
   */
  setGroupQuota(
    authToken: string,
    groupName: string,
    quotaAmount: number,
    quotaMaxAccumulation: number,
    period: QuotaPeriod = 'NONE'
  ): Promise<void> {
    return this.invoke(
      'setGroupQuota',
      [authToken, groupName, asDouble(quotaAmount), period, asDouble(quotaMaxAccumulation)],
      decode.none
    );
  }

  addAdminAccessGroup(authToken: string, groupName: string): Promise<void> {
    return this.invoke('addAdminAccessGroup', [authToken, groupName], decode.none);
  }

  removeAdminAccessGroup(authToken: string, groupName: string): Promise<void> {
    return this.invoke('removeAdminAccessGroup', [authToken, groupName], decode.none);
  }

  /** Starts a background sync; poll `getTaskStatus` for completion */
  performGroupSync(authToken: string): Promise<void> {
    return this.invoke('performGroupSync', [authToken], decode.none);
  }

  performUserAndGroupSync(authToken: string): Promise<void> {
    return this.invoke('performUserAndGroupSync', [authToken], decode.none);
  }

  performUserAndGroupSyncAdvanced(
    authToken: string,
    deleteNonExistentUsers = false,
    updateUserDetails = false
  ): Promise<void> {
    return this.invoke(
      'performUserAndGroupSyncAdvanced',
      [authToken, deleteNonExistentUsers, updateUserDetails],
      decode.none
    );
  }

  // ===========================================================================
  // Shared Accounts
  // ===========================================================================

  addNewSharedAccount(authToken: string, sharedAccountName: string): Promise<void> {
    return this.invoke('addNewSharedAccount', [authToken, sharedAccountName], decode.none);
  }

  deleteExistingSharedAccount(authToken: string, sharedAccountName: string): Promise<void> {
    return this.invoke('deleteExistingSharedAccount', [authToken, sharedAccountName], decode.none);
  }

  renameSharedAccount(authToken: string, currentSharedAccountName: string, newSharedAccountName: string): Promise<void> {
    return this.invoke(
      'renameSharedAccount',
      [authToken, currentSharedAccountName, newSharedAccountName],
      decode.none
    );
  }

  isSharedAccountExists(authToken: string, accountName: string): Promise<boolean> {
    return this.invoke('isSharedAccountExists', [authToken, accountName], decode.boolean);
  }

  listSharedAccounts(authToken: string, offset = 0, limit = DEFAULT_LIMIT): Promise<string[]> {
    return this.invoke('listSharedAccounts', [authToken, offset, limit], decode.stringList);
  }

  getSharedAccountAccountBalance(authToken: string, accountName: string): Promise<number> {
    return this.invoke('getSharedAccountAccountBalance', [authToken, accountName], decode.number);
  }

  setSharedAccountAccountBalance(authToken: string, accountName: string, balance: number, comment?: string): Promise<void> {
    return this.invoke(
      'setSharedAccountAccountBalance',
      [authToken, accountName, asDouble(balance), comment],
      decode.none
    );
  }

  adjustSharedAccountAccountBalance(
    authToken: string,
    accountName: string,
    adjustment: number,
    comment?: string
  ): Promise<void> {
    return this.invoke(
      'adjustSharedAccountAccountBalance',
      [authToken, accountName, asDouble(adjustment), comment],
      decode.none
    );
  }

  getSharedAccountOverdraftMode(authToken: string, accountName: string): Promise<string> {
    return this.invoke('getSharedAccountOverdraftMode', [authToken, accountName], decode.string);
  }

  setSharedAccountOverdraftMode(authToken: string, accountName: string, mode: OverdraftMode): Promise<void> {
    return this.invoke('setSharedAccountOverdraftMode', [authToken, accountName, mode], decode.none);
  }

  getSharedAccountProperty(authToken: string, sharedAccountName: string, propertyName: string): Promise<string> {
    return this.invoke('getSharedAccountProperty', [authToken, sharedAccountName, propertyName], decode.string);
  }

  getSharedAccountProperties(authToken: string, sharedAccountName: string, propertyNames: string[]): Promise<string[]> {
    return this.invoke(
      'getSharedAccountProperties',
      [authToken, sharedAccountName, propertyNames],
      decode.stringList
    );
  }

  setSharedAccountProperty(
    authToken: string,
    sharedAccountName: string,
    propertyName: string,
    propertyValue: string
  ): Promise<void> {
    return this.invoke(
      'setSharedAccountProperty',
      [authToken, sharedAccountName, propertyName, propertyValue],
      decode.none
    );
  }

  setSharedAccountProperties(
    authToken: string,
    sharedAccountName: string,
    propertyNamesAndValues: PropertyAssignment[]
  ): Promise<void> {
    return this.invoke(
      'setSharedAccountProperties',
      [authToken, sharedAccountName, toPairs(propertyNamesAndValues)],
      decode.none
    );
  }

  addSharedAccountAccessGroup(authToken: string, sharedAccountName: string, groupName: string): Promise<void> {
    return this.invoke('addSharedAccountAccessGroup', [authToken, sharedAccountName, groupName], decode.none);
  }

  removeSharedAccountAccessGroup(authToken: string, sharedAccountName: string, groupName: string): Promise<void> {
    return this.invoke('removeSharedAccountAccessGroup', [authToken, sharedAccountName, groupName], decode.none);
  }

  addSharedAccountAccessUser(authToken: string, sharedAccountName: string, userName: string): Promise<void> {
    return this.invoke('addSharedAccountAccessUser', [authToken, sharedAccountName, userName], decode.none);
  }

  removeSharedAccountAccessUser(authToken: string, sharedAccountName: string, userName: string): Promise<void> {
    return this.invoke('removeSharedAccountAccessUser', [authToken, sharedAccountName, userName], decode.none);
  }

  disableSharedAccount(authToken: string, sharedAccountName: string, disableMins: number): Promise<void> {
    return this.invoke('disableSharedAccount', [authToken, sharedAccountName, disableMins], decode.none);
  }

  /**
   * Import shared accounts from a file on the server. With `test` set the
   * server only validates the file. Resolves with the server's summary.
   */
  batchImportSharedAccounts(
    authToken: string,
    importFile: string,
    test = false,
    deleteNonExistentAccounts = false
  ): Promise<XmlRpcValue> {
    return this.invoke(
      'batchImportSharedAccounts',
      [authToken, importFile, test, deleteNonExistentAccounts],
      decode.value
    );
  }

  // ===========================================================================
  // Printers
  // ===========================================================================

  /** Printer names come back as `server\printer` */
  listPrinters(authToken: string, offset = 0, limit = DEFAULT_LIMIT): Promise<string[]> {
    return this.invoke('listPrinters', [authToken, offset, limit], decode.stringList);
  }

  getPrinterProperty(authToken: string, serverName: string, printerName: string, propertyName: string): Promise<string> {
    return this.invoke('getPrinterProperty', [authToken, serverName, printerName, propertyName], decode.string);
  }

  getPrinterProperties(
    authToken: string,
    serverName: string,
    printerName: string,
    propertyNames: string[]
  ): Promise<string[]> {
    return this.invoke(
      'getPrinterProperties',
      [authToken, serverName, printerName, propertyNames],
      decode.stringList
    );
  }

  setPrinterProperty(
    authToken: string,
    serverName: string,
    printerName: string,
    propertyName: string,
    propertyValue: string
  ): Promise<void> {
    return this.invoke(
      'setPrinterProperty',
      [authToken, serverName, printerName, propertyName, propertyValue],
      decode.none
    );
  }

  setPrinterProperties(
    authToken: string,
    serverName: string,
    printerName: string,
    propertyNamesAndValues: PropertyAssignment[]
  ): Promise<void> {
    return this.invoke(
      'setPrinterProperties',
      [authToken, serverName, printerName, toPairs(propertyNamesAndValues)],
      decode.none
    );
  }

  getPrinterCostSimple(authToken: string, serverName: string, printerName: string): Promise<number> {
    return this.invoke('getPrinterCostSimple', [authToken, serverName, printerName], decode.number);
  }

  setPrinterCostSimple(authToken: string, serverName: string, printerName: string, costPerPage: number): Promise<void> {
    return this.invoke(
      'setPrinterCostSimple',
      [authToken, serverName, printerName, asDouble(costPerPage)],
      decode.none
    );
  }

  enablePrinter(authToken: string, serverName: string, printerName: string): Promise<void> {
    return this.invoke('enablePrinter', [authToken, serverName, printerName], decode.none);
  }

  /** A negative `disableMins` disables the printer until it is re-enabled */
  disablePrinter(authToken: string, serverName: string, printerName: string, disableMins: number): Promise<void> {
    return this.invoke('disablePrinter', [authToken, serverName, printerName, disableMins], decode.none);
  }

  deletePrinter(authToken: string, serverName: string, printerName: string): Promise<void> {
    return this.invoke('deletePrinter', [authToken, serverName, printerName], decode.none);
  }

  renamePrinter(
    authToken: string,
    serverName: string,
    printerName: string,
    newServerName: string,
    newPrinterName: string
  ): Promise<void> {
    return this.invoke(
      'renamePrinter',
      [authToken, serverName, printerName, newServerName, newPrinterName],
      decode.none
    );
  }

  resetPrinterCounts(authToken: string, serverName: string, printerName: string, resetBy: string): Promise<void> {
    return this.invoke('resetPrinterCounts', [authToken, serverName, printerName, resetBy], decode.none);
  }

  addPrinterAccessGroup(authToken: string, serverName: string, printerName: string, groupName: string): Promise<void> {
    return this.invoke('addPrinterAccessGroup', [authToken, serverName, printerName, groupName], decode.none);
  }

  removePrinterAccessGroup(
    authToken: string,
    serverName: string,
    printerName: string,
    groupName: string
  ): Promise<void> {
    return this.invoke('removePrinterAccessGroup', [authToken, serverName, printerName, groupName], decode.none);
  }

  addPrinterGroup(authToken: string, serverName: string, printerName: string, printerGroupName: string): Promise<void> {
    return this.invoke('addPrinterGroup', [authToken, serverName, printerName, printerGroupName], decode.none);
  }

  /** Replace the printer's group memberships */
  setPrinterGroups(
    authToken: string,
    serverName: string,
    printerName: string,
    printerGroupNames: string[]
  ): Promise<void> {
    return this.invoke('setPrinterGroups', [authToken, serverName, printerName, printerGroupNames], decode.none);
  }

  batchImportPrinters(authToken: string, importFile: string): Promise<void> {
    return this.invoke('batchImportPrinters', [authToken, importFile], decode.none);
  }

  getPrinterSnmpv3(authToken: string, serverName: string, printerName: string): Promise<XmlRpcStruct> {
    return this.invoke('getPrinterSnmpv3', [authToken, serverName, printerName], decode.struct);
  }

  enablePrinterSnmpv3(
    authToken: string,
    serverName: string,
    printerName: string,
    credentials: Snmpv3Credentials
  ): Promise<void> {
    return this.invoke(
      'enablePrinterSnmpv3',
      [authToken, serverName, printerName, ...orderSnmpv3(credentials)],
      decode.none
    );
  }

  disablePrinterSnmpv3(authToken: string, serverName: string, printerName: string): Promise<void> {
    return this.invoke('disablePrinterSnmpv3', [authToken, serverName, printerName], decode.none);
  }

  // ===========================================================================
  // Devices
  // ===========================================================================

  /** Push pending configuration to a multifunction device */
  applyDeviceSettings(authToken: string, deviceName: string): Promise<void> {
    return this.invoke('applyDeviceSettings', [authToken, deviceName], decode.none);
  }

  getDeviceSnmpv3(authToken: string, deviceName: string): Promise<XmlRpcStruct> {
    return this.invoke('getDeviceSnmpv3', [authToken, deviceName], decode.struct);
  }

  enableDeviceSnmpv3(authToken: string, deviceName: string, credentials: Snmpv3Credentials): Promise<void> {
    return this.invoke(
      'enableDeviceSnmpv3',
      [authToken, deviceName, ...orderSnmpv3(credentials)],
      decode.none
    );
  }

  disableDeviceSnmpv3(authToken: string, deviceName: string): Promise<void> {
    return this.invoke('disableDeviceSnmpv3', [authToken, deviceName], decode.none);
  }

  // ===========================================================================
  // System
  // ===========================================================================

  getConfigValue(authToken: string, configName: string): Promise<string> {
    return this.invoke('getConfigValue', [authToken, configName], decode.string);
  }

  setConfigValue(authToken: string, configName: string, configValue: string): Promise<void> {
    return this.invoke('setConfigValue', [authToken, configName, configValue], decode.none);
  }

  /** Progress of the most recent long-running task (sync, backup) */
  getTaskStatus(authToken: string): Promise<TaskStatus> {
    return this.invoke('getTaskStatus', [authToken], decode.taskStatus);
  }

  performOnlineBackup(authToken: string): Promise<void> {
    return this.invoke('performOnlineBackup', [authToken], decode.none);
  }

  saveThreadSnapshot(authToken: string): Promise<void> {
    return this.invoke('saveThreadSnapshot', [authToken], decode.none);
  }

  createUserClientAccountsFile(authToken: string): Promise<void> {
    return this.invoke('createUserClientAccountsFile', [authToken], decode.none);
  }

  /** Resolves false when the server refuses the new password */
  changeInternalAdminPassword(authToken: string, newPassword: string): Promise<boolean> {
    return this.invoke('changeInternalAdminPassword', [authToken, newPassword], decode.boolean);
  }

  /** Install a license file already present on the server */
  installLicense(authToken: string, licenseFile: string): Promise<void> {
    return this.invoke('installLicense', [authToken, licenseFile], decode.none);
  }

  generateAdHocReport(
    authToken: string,
    reportType: string,
    dataParams: string,
    exportTypeExt: string,
    reportTitle: string,
    saveLocation: string
  ): Promise<void> {
    return this.invoke(
      'generateAdHocReport',
      [authToken, reportType, dataParams, exportTypeExt, reportTitle, saveLocation],
      decode.none
    );
  }

  generateScheduledReport(authToken: string, reportTitle: string, saveLocation: string): Promise<void> {
    return this.invoke('generateScheduledReport', [authToken, reportTitle, saveLocation], decode.none);
  }

  /** Record a job the server did not track itself, as `key=value` pairs */
  processJob(authToken: string, jobDetails: string[]): Promise<void> {
    return this.invoke('processJob', [authToken, jobDetails], decode.none);
  }

  runCommand(authToken: string, commandName: string, args: string[]): Promise<XmlRpcValue> {
    return this.invoke('runCommand', [authToken, commandName, args], decode.value);
  }
}
