#!/usr/bin/env node
/**
 * qkd-channel: run one endpoint of a hybrid session over TCP
 *
 *   qkd-channel listen --port P
 *   qkd-channel connect --host H --port P
 *
 * Lines read from stdin are sent as messages; received messages are printed.
 * Exit codes: 0 clean close, 2 eavesdropping suspected, 3 authentication
 * failure, 4 transport error, 1 anything else.
 */

import { createInterface } from 'node:readline';
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import {
  AuthenticationFailureError,
  EavesdroppingSuspectedError,
  InvalidParameterError,
  TransportError,
  errorMessage,
} from './error.js';
import { ConsoleOutput, type Output } from './output.js';
import { configFromEnv, resolveConfig, type SessionConfig } from './config.js';
import { assertValid, validatePort } from './validation.js';
import { MlDsaAuthenticator, PinnedTrust, TrustOnFirstUse, fingerprint, type TrustPolicy } from './auth/authenticator.js';
import { SessionOrchestrator } from './session/orchestrator.js';
import { Role, isTerminal } from './session/state.js';
import { connectTcp, listenTcp } from './transport/tcp.js';
import type { Transport } from './transport/types.js';
import { bytesToString, stringToBytes } from './crypto/utils.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_EAVESDROPPING = 2;
export const EXIT_AUTHENTICATION = 3;
export const EXIT_TRANSPORT = 4;

export type CliCommand =
  | { command: 'listen'; host: string; port: number; options: CliOptions }
  | { command: 'connect'; host: string; port: number; options: CliOptions };

export interface CliOptions {
  /** Hex seed for a reproducible ML-DSA identity */
  identitySeed?: Uint8Array;
  /** Hex seed of the only peer identity to accept; trust-on-first-use otherwise */
  peerSeed?: Uint8Array;
  config: Partial<SessionConfig>;
}

const USAGE = `Usage:
  qkd-channel listen --port <port> [--host <host>]
  qkd-channel connect --host <host> --port <port>

Options:
  --identity-seed <hex>   32-byte seed for this endpoint's signing key
  --peer-seed <hex>       32-byte seed of the peer's signing key (pins the peer)
  --error-rate <rate>     simulated quantum channel error rate
  --debug                 verbose logging`;

function parseSeed(name: string, value: string | undefined): Uint8Array | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^[0-9a-fA-F]{64}$/.test(value)) {
    throw new InvalidParameterError(`--${name} must be 64 hex characters`, [{ field: name, message: 'Invalid seed', value }]);
  }
  return Uint8Array.from(Buffer.from(value, 'hex'));
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      'identity-seed': { type: 'string' },
      'peer-seed': { type: 'string' },
      'error-rate': { type: 'string' },
      debug: { type: 'boolean', default: false },
    },
  });

  const command = positionals[0];
  if (command !== 'listen' && command !== 'connect') {
    throw new InvalidParameterError(`Unknown command: ${command ?? '(none)'}\n${USAGE}`);
  }
  if (values.port === undefined) {
    throw new InvalidParameterError(`--port is required\n${USAGE}`);
  }
  if (command === 'connect' && values.host === undefined) {
    throw new InvalidParameterError(`--host is required for connect\n${USAGE}`);
  }

  const port = Number(values.port);
  assertValid(validatePort(port), 'Invalid port');

  const config: Partial<SessionConfig> = { debug: values.debug };
  if (values['error-rate'] !== undefined) {
    config.channelErrorRate = Number(values['error-rate']);
  }

  return {
    command,
    host: values.host ?? '127.0.0.1',
    port,
    options: {
      identitySeed: parseSeed('identity-seed', values['identity-seed']),
      peerSeed: parseSeed('peer-seed', values['peer-seed']),
      config,
    },
  };
}

/**
 * Exit status for a session outcome
 */
export function exitCodeFor(error: unknown): number {
  if (error === null || error === undefined) return EXIT_OK;
  if (error instanceof EavesdroppingSuspectedError) return EXIT_EAVESDROPPING;
  if (error instanceof AuthenticationFailureError) return EXIT_AUTHENTICATION;
  if (error instanceof TransportError) return EXIT_TRANSPORT;
  return EXIT_FAILURE;
}

async function openTransport(cli: CliCommand, output: Output): Promise<Transport> {
  if (cli.command === 'connect') {
    await output.info(`Connecting to ${cli.host}:${cli.port}`);
    return connectTcp({ host: cli.host, port: cli.port });
  }

  const listener = await listenTcp({ host: cli.host, port: cli.port });
  await output.info(`Listening on ${cli.host}:${listener.port}`);
  try {
    return await listener.accept();
  } finally {
    await listener.close();
  }
}

async function printIncoming(session: SessionOrchestrator, output: Output): Promise<void> {
  for (;;) {
    const message = await session.receive();
    if (message === null) {
      return;
    }
    await output.print(bytesToString(message));
  }
}

/**
 * Send stdin lines until stdin ends or the peer closes, printing whatever arrives meanwhile
 */
async function converse(session: SessionOrchestrator, output: Output): Promise<void> {
  const lines = createInterface({ input: process.stdin, terminal: false });
  const incoming = printIncoming(session, output)
    .then((): unknown => null, (error: unknown) => error)
    .finally(() => lines.close());

  for await (const line of lines) {
    if (isTerminal(session.state.phase)) {
      break;
    }
    await session.send(stringToBytes(line));
    await output.debug(`Sent ${line.length} characters`);
  }

  await session.close();
  const failure = await incoming;
  if (failure) {
    throw failure;
  }
}

export async function run(argv: string[]): Promise<number> {
  let cli: CliCommand;
  let config: SessionConfig;
  try {
    cli = parseCliArgs(argv);
    config = resolveConfig({ ...configFromEnv(), ...cli.options.config });
  } catch (error) {
    console.error(errorMessage(error));
    return EXIT_FAILURE;
  }

  const output = new ConsoleOutput({ prefix: `[${cli.command}]`, debug: config.debug });
  const authenticator = MlDsaAuthenticator.generate(cli.options.identitySeed);
  const trust: TrustPolicy = cli.options.peerSeed
    ? new PinnedTrust([MlDsaAuthenticator.generate(cli.options.peerSeed).identity])
    : new TrustOnFirstUse();

  await output.info(`Identity ${fingerprint(authenticator.identity)}`);

  try {
    const transport = await openTransport(cli, output);
    const session = new SessionOrchestrator({
      role: cli.command === 'connect' ? Role.Initiator : Role.Responder,
      transport,
      authenticator,
      trust,
      config,
      output,
    });

    const summary = await session.handshake();
    await output.info(
      `QBER ${summary.qber.errorRate.toFixed(4)}, ${summary.reconciliation.correctedBits} bits corrected, ${summary.keyBits} quantum key bits`,
    );

    await converse(session, output);
    const phase = await session.closed();
    return exitCodeFor(phase.kind === 'aborted' ? phase.reason : null);
  } catch (error) {
    await output.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  run(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
      console.error(errorMessage(error));
      process.exit(EXIT_FAILURE);
    },
  );
}
