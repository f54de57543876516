/**
 * @fileoverview Server command types
 *
 * Wire values exchanged with the Application Server's XML-RPC endpoint and
 * the typed shapes of its parameters and results.
 */

// =============================================================================
// Wire Values
// =============================================================================

/**
 * A number that must travel as an XML-RPC `<double>`, even when integral.
 * The server matches methods by exact parameter type, so balances, costs
 * and quotas are wrapped with {@link asDouble}.
 */
export class XmlRpcDouble {
  constructor(readonly value: number) {}
}

export function asDouble(value: number): XmlRpcDouble {
  return new XmlRpcDouble(value);
}

export type XmlRpcScalar = string | number | boolean | null | Date | Buffer;

export type XmlRpcValue = XmlRpcScalar | XmlRpcDouble | XmlRpcValue[] | XmlRpcStruct;

export type XmlRpcStruct = { [key: string]: XmlRpcValue };

/** A parameter as accepted by the proxy; `undefined` is sent as `<nil/>` */
export type XmlRpcParam = XmlRpcValue | undefined;

// =============================================================================
// Connection
// =============================================================================

export interface ServerConnectionOptions {
  /** Host name or address of the Application Server (default: localhost) */
  host?: string;
  /** Listening port (default: 9191; the server's HTTPS port is usually 9192) */
  port?: number;
  /** Use HTTPS (default: false) */
  ssl?: boolean;
}

export interface ServerEndpoint {
  readonly host: string;
  readonly port: number;
  readonly ssl: boolean;
  readonly path: string;
  readonly url: string;
}

// =============================================================================
// Parameter Shapes
// =============================================================================

/** A `[propertyName, propertyValue]` pair for the bulk property setters */
export type PropertyAssignment = [name: string, value: string];

export type OverdraftMode = 'DEFAULT' | 'INDIVIDUAL';

export type QuotaPeriod = 'NONE' | 'DAILY' | 'WEEKLY' | 'MONTHLY' | 'CUSTOM';

export interface Snmpv3Credentials {
  context: string;
  userName: string;
  authPass: string;
  authProto: string;
  privPass: string;
  privProto: string;
}

export interface StandardPopupSelection {
  allowPersonal: boolean;
  allowListSelection: boolean;
  allowPinCode: boolean;
  allowPrintingAsOtherUser: boolean;
  chargeToPersonalWhenSharedSelected: boolean;
  defaultSharedAccount?: string;
}
