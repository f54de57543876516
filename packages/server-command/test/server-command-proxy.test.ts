/**
 * @fileoverview Tests for ServerCommandProxy
 *
 * Runs against an in-memory transport; wire encoding is covered by the
 * transport tests.
 */
import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { PaperkitLogger, ErrorCodes } from '@paperkit/core';
import { ServerCommandProxy } from '../src/server-command-proxy.js';
import { InvalidResponseError, RemoteFaultError } from '../src/errors.js';
import { XmlRpcDouble, type XmlRpcValue } from '../src/types.js';
import type { ServerCommandTransport } from '../src/transport/types.js';

type Responder = (method: string, params: XmlRpcValue[]) => unknown;

class FakeTransport implements ServerCommandTransport {
  readonly calls: Array<{ method: string; params: XmlRpcValue[] }> = [];
  closeCount = 0;

  constructor(public respond: Responder = () => null) {}

  async call(method: string, params: XmlRpcValue[]): Promise<unknown> {
    this.calls.push({ method, params });
    return this.respond(method, params);
  }

  close(): void {
    this.closeCount++;
  }
}

const TOKEN = 'test-token';

describe('ServerCommandProxy', () => {
  let transport: FakeTransport;
  let factory: Mock<() => ServerCommandTransport>;
  let proxy: ServerCommandProxy;

  beforeEach(() => {
    transport = new FakeTransport();
    factory = vi.fn<() => ServerCommandTransport>(() => transport);
    proxy = new ServerCommandProxy({ transportFactory: factory });
  });

  function lastCall(): { method: string; params: XmlRpcValue[] } | undefined {
    return transport.calls[transport.calls.length - 1];
  }

  describe('construction', () => {
    it('should default to the local server over http', () => {
      expect(proxy.endpoint.url).toBe('http://localhost:9191/rpc/api/xmlrpc');
    });

    it('should build an https url when ssl is set', () => {
      const secure = new ServerCommandProxy({ host: 'print.example', port: 9192, ssl: true, transportFactory: factory });
      expect(secure.endpoint.url).toBe('https://print.example:9192/rpc/api/xmlrpc');
    });

    it('should not open a connection', () => {
      expect(factory).not.toHaveBeenCalled();
      expect(proxy.isOpen).toBe(false);
    });
  });

  describe('open and close', () => {
    it('should create the transport once with the call options', () => {
      const tuned = new ServerCommandProxy({ transportFactory: factory, timeoutMs: 5000, rejectUnauthorized: false });
      tuned.open();
      tuned.open();

      expect(factory).toHaveBeenCalledTimes(1);
      expect(factory).toHaveBeenCalledWith(tuned.endpoint, { timeoutMs: 5000, rejectUnauthorized: false });
      expect(tuned.isOpen).toBe(true);
    });

    it('should default to a 30 second timeout with certificate checks', () => {
      proxy.open();
      expect(factory).toHaveBeenCalledWith(proxy.endpoint, { timeoutMs: 30000, rejectUnauthorized: true });
    });

    it('should open lazily on the first call', async () => {
      transport.respond = () => 3;
      await expect(proxy.getTotalUsers(TOKEN)).resolves.toBe(3);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(proxy.isOpen).toBe(true);
    });

    it('should close the transport once however often close is called', () => {
      proxy.open();
      proxy.close();
      proxy.close();

      expect(transport.closeCount).toBe(1);
      expect(proxy.isOpen).toBe(false);
    });

    it('should treat closing an unopened proxy as a no-op', () => {
      proxy.close();
      expect(factory).not.toHaveBeenCalled();
      expect(transport.closeCount).toBe(0);
    });

    it('should reopen when called after close', async () => {
      proxy.open();
      proxy.close();
      await proxy.addNewUser(TOKEN, 'alice');
      expect(factory).toHaveBeenCalledTimes(2);
    });
  });

  describe('argument forwarding', () => {
    it('should send the token first followed by the arguments', async () => {
      transport.respond = () => true;
      await expect(proxy.isUserExists(TOKEN, 'alice')).resolves.toBe(true);
      expect(lastCall()).toEqual({ method: 'isUserExists', params: [TOKEN, 'alice'] });
    });

    it('should send omitted optional values as nil', async () => {
      await proxy.addNewInternalUser(TOKEN, 'jdoe', 'secret');
      expect(lastCall()?.params).toEqual([TOKEN, 'jdoe', 'secret', null, null, null, null]);
    });

    it('should fill in documented paging defaults', async () => {
      transport.respond = () => [];
      await proxy.listUserAccounts(TOKEN);
      await proxy.getGroupMembers(TOKEN, 'staff', 20);

      expect(transport.calls.map((call) => call.params)).toEqual([
        [TOKEN, 0, 1000],
        [TOKEN, 'staff', 20, 1000],
      ]);
    });

    it('should default boolean flags to false', async () => {
      await proxy.deleteExistingUser(TOKEN, 'alice');
      await proxy.listUserSharedAccounts(TOKEN, 'alice');

      expect(transport.calls.map((call) => call.params)).toEqual([
        [TOKEN, 'alice', false],
        [TOKEN, 'alice', 0, 1000, false],
      ]);
    });

    it('should send monetary amounts as doubles', async () => {
      await proxy.adjustUserAccountBalance(TOKEN, 'alice', 10, 'top-up');
      expect(lastCall()?.params).toEqual([TOKEN, 'alice', new XmlRpcDouble(10), 'top-up', null]);
      expect(lastCall()?.params[2]).toBeInstanceOf(XmlRpcDouble);
    });

    it('should send the group before the adjustment and the account last for group adjustments', async () => {
      await proxy.adjustUserAccountBalanceByGroup(TOKEN, 'staff', 5, 'term start', 'Printing');
      expect(lastCall()?.params).toEqual([TOKEN, 'staff', new XmlRpcDouble(5), 'term start', 'Printing']);
    });

    it('should send the limit after the adjustment for capped group adjustments', async () => {
      await proxy.adjustUserAccountBalanceByGroupUpTo(TOKEN, 'staff', 5, 50, 'weekly', 'Printing');
      expect(lastCall()?.params).toEqual([
        TOKEN,
        'staff',
        new XmlRpcDouble(5),
        new XmlRpcDouble(50),
        'weekly',
        'Printing',
      ]);
    });

    it('should send the quota period before the maximum accumulation', async () => {
      await proxy.setGroupQuota(TOKEN, 'staff', 50, 200, 'WEEKLY');
      expect(lastCall()?.params).toEqual([TOKEN, 'staff', new XmlRpcDouble(50), 'WEEKLY', new XmlRpcDouble(200)]);
    });

    it('should default the quota period to NONE', async () => {
      await proxy.setGroupQuota(TOKEN, 'staff', 50, 200);
      expect(lastCall()?.params[3]).toBe('NONE');
    });

    it('should send property assignments as pairs', async () => {
      await proxy.setUserProperties(TOKEN, 'alice', [
        ['email', 'alice@example.com'],
        ['department', 'Finance'],
      ]);
      expect(lastCall()?.params).toEqual([
        TOKEN,
        'alice',
        [
          ['email', 'alice@example.com'],
          ['department', 'Finance'],
        ],
      ]);
    });

    it('should send printer properties in server, printer, name, value order', async () => {
      await proxy.setPrinterProperty(TOKEN, 'srv01', 'Lab', 'disabled', 'true');
      expect(lastCall()).toEqual({
        method: 'setPrinterProperty',
        params: [TOKEN, 'srv01', 'Lab', 'disabled', 'true'],
      });
    });

    it('should spread SNMPv3 credentials in the server order', async () => {
      const credentials = {
        context: 'ctx',
        userName: 'snmp-user',
        authPass: 'auth-secret',
        privPass: 'priv-secret',
        authProto: 'SHA',
        privProto: 'AES',
      };

      await proxy.enablePrinterSnmpv3(TOKEN, 'srv01', 'Lab', credentials);
      await proxy.enableDeviceSnmpv3(TOKEN, 'device-1', credentials);

      const expected = ['ctx', 'snmp-user', 'auth-secret', 'priv-secret', 'SHA', 'AES'];
      expect(transport.calls.map((call) => call.params)).toEqual([
        [TOKEN, 'srv01', 'Lab', ...expected],
        [TOKEN, 'device-1', ...expected],
      ]);
    });

    it('should flatten the standard popup selection', async () => {
      await proxy.setUserAccountSelectionStandardPopup(TOKEN, 'alice', {
        allowPersonal: true,
        allowListSelection: false,
        allowPinCode: true,
        allowPrintingAsOtherUser: false,
        chargeToPersonalWhenSharedSelected: true,
      });
      expect(lastCall()?.params).toEqual([TOKEN, 'alice', true, false, true, false, true, null]);
    });

    it('should install a license through the remote method', async () => {
      await proxy.installLicense(TOKEN, 'C:\\licenses\\site.license');
      expect(lastCall()).toEqual({ method: 'installLicense', params: [TOKEN, 'C:\\licenses\\site.license'] });
    });
  });

  describe('results', () => {
    it('should return lists unchanged', async () => {
      transport.respond = () => ['alice', 'bob'];
      await expect(proxy.listUserAccounts(TOKEN)).resolves.toEqual(['alice', 'bob']);
    });

    it('should resolve void methods with undefined whatever the server returns', async () => {
      transport.respond = () => 0;
      await expect(proxy.addNewGroup(TOKEN, 'staff')).resolves.toBeUndefined();
    });

    it('should return task status as reported', async () => {
      transport.respond = () => ({ completed: false, message: 'Syncing users' });
      await expect(proxy.getTaskStatus(TOKEN)).resolves.toEqual({ completed: false, message: 'Syncing users' });
    });

    it('should return structs for quota lookups', async () => {
      transport.respond = () => ({ QuotaAmount: 10, QuotaPeriod: 'WEEKLY' });
      await expect(proxy.getGroupQuota(TOKEN, 'staff')).resolves.toEqual({ QuotaAmount: 10, QuotaPeriod: 'WEEKLY' });
    });

    it('should reject a result of the wrong type', async () => {
      transport.respond = () => 'many';
      const error = await proxy.getTotalUsers(TOKEN).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toMatchObject({
        code: ErrorCodes.INVALID_RESPONSE,
        method: 'getTotalUsers',
        issues: ['Expected number, received string'],
      });
    });

    it('should surface remote faults without retrying', async () => {
      const fault = new RemoteFaultError('getUserAccountBalance', 4, 'User does not exist: bob');
      transport.respond = () => {
        throw fault;
      };

      await expect(proxy.getUserAccountBalance(TOKEN, 'bob')).rejects.toBe(fault);
      expect(transport.calls).toHaveLength(1);
    });
  });

  describe('verbose logging', () => {
    it('should log requests with the token redacted', async () => {
      const lines: string[] = [];
      const logger = new PaperkitLogger({ level: 'info', pretty: false, destination: { write: (line: string) => lines.push(line) } });
      const verbose = new ServerCommandProxy({ transportFactory: factory, verbose: true, logger });
      transport.respond = () => true;

      await verbose.isUserExists(TOKEN, 'alice');

      const records = lines.map((line): unknown => JSON.parse(line));
      expect(records).toHaveLength(2);
      expect(records[0]).toMatchObject({ msg: 'XML-RPC request', method: 'isUserExists', params: ['[redacted]', 'alice'] });
      expect(records[1]).toMatchObject({ msg: 'XML-RPC response', method: 'isUserExists', result: true });
      expect(lines.join('')).not.toContain(TOKEN);
    });

    it('should stay quiet at info level when not verbose', async () => {
      const lines: string[] = [];
      const logger = new PaperkitLogger({ level: 'info', pretty: false, destination: { write: (line: string) => lines.push(line) } });
      const quiet = new ServerCommandProxy({ transportFactory: factory, logger });

      await quiet.addNewUser(TOKEN, 'alice');

      expect(lines).toEqual([]);
    });
  });
});
