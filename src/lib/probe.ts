/**
 * UDP liveness probe for DNS resolvers.
 *
 * Sends one hand-built `A google.com` query and accepts the resolver only if
 * the first reply from that address and port echoes our transaction id with
 * the QR bit set. Anything
 * else, including silence, means unhealthy. Errors never escape.
 */

import { createSocket } from 'node:dgram';
import { isIP } from 'node:net';
import type { Logger } from '../types/logger.js';
import { silentLogger } from './logger.js';

export const PROBE_TRANSACTION_ID = 0xabcd;
export const PROBE_DOMAIN = 'google.com';
export const DNS_PORT = 53;
export const DNS_HEADER_BYTES = 12;
export const MAX_REPLY_BYTES = 512;
export const DEFAULT_PROBE_TIMEOUT_SECONDS = 2;

/** RD set, everything else zero. */
const FLAGS_RECURSION_DESIRED = 0x0100;
const QTYPE_A = 1;
const QCLASS_IN = 1;

/**
 * Encodes `name` as length-prefixed labels terminated by a zero byte.
 */
export function encodeQName(name: string): Buffer {
  const labels = name.split('.').filter((label) => label.length > 0);
  const parts: Buffer[] = [];
  for (const label of labels) {
    const bytes = Buffer.from(label, 'ascii');
    if (bytes.length > 63) {
      throw new RangeError(`DNS label too long: ${label}`);
    }
    parts.push(Buffer.from([bytes.length]), bytes);
  }
  parts.push(Buffer.from([0]));
  return Buffer.concat(parts);
}

/**
 * Builds the probe query: 12-byte header (one question) + QNAME + QTYPE A + QCLASS IN.
 */
export function buildProbeQuery(
  name: string = PROBE_DOMAIN,
  transactionId: number = PROBE_TRANSACTION_ID
): Buffer {
  const header = Buffer.alloc(DNS_HEADER_BYTES);
  header.writeUInt16BE(transactionId, 0);
  header.writeUInt16BE(FLAGS_RECURSION_DESIRED, 2);
  header.writeUInt16BE(1, 4);

  const question = Buffer.alloc(4);
  question.writeUInt16BE(QTYPE_A, 0);
  question.writeUInt16BE(QCLASS_IN, 2);

  return Buffer.concat([header, encodeQName(name), question]);
}

export const PROBE_QUERY = buildProbeQuery();

/**
 * Checks that `reply` is a DNS response to our probe.
 *
 * Requires at least a full header, a matching transaction id and the QR bit.
 */
export function isValidProbeReply(
  reply: Uint8Array,
  transactionId: number = PROBE_TRANSACTION_ID
): boolean {
  if (reply.length < DNS_HEADER_BYTES) {
    return false;
  }
  if (reply[0] !== transactionId >> 8 || reply[1] !== (transactionId & 0xff)) {
    return false;
  }
  return (reply[2] & 0x80) !== 0;
}

export interface ProbeOptions {
  /** Destination port, 53 unless a test points it elsewhere */
  port?: number;
  logger?: Logger;
}

/**
 * Sends one probe to `address` and waits up to `timeoutSeconds` for the reply.
 *
 * @returns true only for a well-formed reply to our query
 */
export function isResponsive(
  address: string,
  timeoutSeconds: number = DEFAULT_PROBE_TIMEOUT_SECONDS,
  options: ProbeOptions = {}
): Promise<boolean> {
  const logger = options.logger ?? silentLogger;
  const port = options.port ?? DNS_PORT;
  const family = isIP(address);

  if (family === 0) {
    logger.debug(`DNS health check skipped for '${address}': not an IP address`);
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const socket = createSocket(family === 6 ? 'udp6' : 'udp4');
    let timer: NodeJS.Timeout | undefined;
    let settled = false;

    const finish = (healthy: boolean, failure?: string): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      socket.close();
      if (failure) {
        logger.debug(`DNS health check failed for ${address}: ${failure}`);
      }
      resolve(healthy);
    };

    timer = setTimeout(() => finish(false, 'timed out'), timeoutSeconds * 1000);

    socket.once('message', (message: Buffer) => {
      const reply = message.subarray(0, MAX_REPLY_BYTES);
      if (isValidProbeReply(reply)) {
        finish(true);
      } else {
        finish(false, `malformed reply (${message.length} bytes)`);
      }
    });

    socket.once('error', (error: Error) => finish(false, error.message));

    // Connected, so datagrams from any other host or port are dropped.
    socket.connect(port, address, () => {
      if (settled) return;
      socket.send(PROBE_QUERY, (error) => {
        if (error) {
          finish(false, error.message);
        }
      });
    });
  });
}

/** Signature shared by the real probe and test doubles. */
export type ProbeFn = (address: string, timeoutSeconds: number) => Promise<boolean>;
