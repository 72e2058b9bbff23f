/**
 * SSH Tunnel Module
 *
 * Forwards a local TCP port to the database host behind an SSH server,
 * for stores that are not reachable directly.
 */

import { readFileSync } from 'fs';
import net from 'net';
import { Client, type ConnectConfig } from 'ssh2';
import type { SshTunnelConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { ConnectivityError, toError } from '../errors/index.js';

export interface Tunnel {
  /** Port on 127.0.0.1 that forwards to the remote database */
  localPort: number;
  close(): Promise<void>;
}

function connectSsh(client: Client, options: ConnectConfig): Promise<void> {
  return new Promise((resolve, reject) => {
    client.once('ready', () => resolve());
    client.once('error', reject);
    client.connect(options);
  });
}

function listen(server: net.Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

/**
 * Opens the SSH connection and starts forwarding
 *
 * @throws ConnectivityError if the key cannot be read, the SSH server refuses
 * the connection, or the local port cannot be bound
 */
export async function openTunnel(sshCfg: SshTunnelConfig, logger: Logger): Promise<Tunnel> {
  logger.info({ host: sshCfg.host, port: sshCfg.port }, 'Setting up SSH tunnel');

  let privateKey: Buffer;
  try {
    privateKey = readFileSync(sshCfg.privateKeyPath);
  } catch (err) {
    throw new ConnectivityError(`Could not read SSH key ${sshCfg.privateKeyPath}`, toError(err));
  }

  const ssh = new Client();
  try {
    await connectSsh(ssh, {
      host: sshCfg.host,
      port: sshCfg.port,
      username: sshCfg.username,
      privateKey,
      passphrase: sshCfg.passphrase
    });
  } catch (err) {
    ssh.end();
    throw new ConnectivityError(`SSH connection to ${sshCfg.host} failed`, toError(err));
  }

  // Errors after the handshake must not go unhandled; the pool sees them as failed queries
  ssh.on('error', (err: Error) => {
    logger.error({ err }, 'SSH connection error');
  });

  const server = net.createServer((socket) => {
    socket.on('error', (err) => {
      logger.warn({ err }, 'Tunnel socket error');
      socket.destroy();
    });

    ssh.forwardOut(
      socket.remoteAddress ?? '127.0.0.1',
      socket.remotePort ?? 0,
      sshCfg.remoteHost,
      sshCfg.remotePort,
      (err, stream) => {
        if (err) {
          logger.error({ err }, 'SSH port forwarding failed');
          socket.destroy();
          return;
        }
        stream.on('error', (streamErr: Error) => {
          logger.warn({ err: streamErr }, 'Forwarded stream error');
          stream.destroy();
          socket.destroy();
        });
        socket.once('close', () => stream.destroy());
        socket.pipe(stream).pipe(socket);
      }
    );
  });

  let localPort: number;
  try {
    localPort = await listen(server, sshCfg.localPort);
  } catch (err) {
    ssh.end();
    throw new ConnectivityError(`Could not bind local tunnel port ${sshCfg.localPort}`, toError(err));
  }

  logger.info({ localPort }, 'SSH tunnel established');

  return {
    localPort,
    close: () =>
      new Promise<void>((resolve) => {
        server.close(() => {
          ssh.end();
          logger.info('SSH tunnel closed');
          resolve();
        });
      })
  };
}
