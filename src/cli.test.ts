/**
 * @fileoverview Tests for the command-line entry point against a loopback printer
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { main } from './cli';
import { ACK, ENQ, NAK, ackWithFrame } from './__tests__/helpers/StubPrinter';

describe('cli main', () => {
  let server: net.Server;
  let port: number;

  beforeAll(async () => {
    server = net.createServer(socket => {
      socket.on('data', chunk => {
        if (chunk[0] === ENQ) {
          socket.write(Uint8Array.of(ACK));
        } else if (chunk[0] === 0x32) {
          socket.write(ackWithFrame(0x32, [0x07]));
        } else {
          socket.write(Uint8Array.of(NAK));
        }
      });
    });
    port = await new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server has no TCP address'));
          return;
        }
        resolve(address.port);
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('should print readiness and exit 0', async () => {
    const code = await main(['--host=127.0.0.1', `--port=${port}`, 'dialog']);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify({ ready: true }, null, 2));
  });

  it('should print query results', async () => {
    const code = await main(['--host=127.0.0.1', `--port=${port}`, 'status', '1']);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify({ success: true, data: 'running' }, null, 2));
  });

  it('should exit 1 when the printer refuses', async () => {
    const code = await main(['--host=127.0.0.1', `--port=${port}`, 'reset-faults']);

    expect(code).toBe(1);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify({ acknowledged: false }, null, 2));
  });

  it('should print usage for invalid arguments without connecting', async () => {
    const code = await main(['status']);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('[CLI]', 'Missing --host');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('should report an unreadable config file', async () => {
    const code = await main(['--host=127.0.0.1', '--config=/nonexistent/v24-dialog.json', 'dialog']);

    expect(code).toBe(1);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify({
      success: false,
      code: 'CONFIG_INVALID',
      error: 'Configuration is invalid. Please check your settings'
    }, null, 2));
  });

  it('should list each invalid config field on its own line', async () => {
    const configPath = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'v24-cli-')), 'printer.json');
    fs.writeFileSync(configPath, JSON.stringify({ port: 70000, responseTimeoutMs: 0 }));

    const code = await main(['--host=127.0.0.1', `--config=${configPath}`, 'dialog']);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '[CLI]',
      'port: Number must be less than or equal to 65535\nresponseTimeoutMs: Number must be greater than 0'
    );
    expect(console.log).toHaveBeenCalledWith(JSON.stringify({
      success: false,
      code: 'CONFIG_INVALID',
      error: 'Configuration is invalid. Please check your settings'
    }, null, 2));
    fs.rmSync(path.dirname(configPath), { recursive: true, force: true });
  });
});
