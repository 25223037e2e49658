import { spawn, type ChildProcess } from 'node:child_process';
import { join } from 'node:path';
import { Client, credentials, type ClientReadableStream } from '@grpc/grpc-js';
import {
  loadSync,
  type AnyDefinition,
  type PackageDefinition,
  type ServiceDefinition,
} from '@grpc/proto-loader';
import type { z } from 'zod';
import type {
  AttitudeSample,
  BatterySample,
  ConnectionStateSample,
  PositionSample,
  RateMetric,
  TelemetrySourcePort,
} from '@telemetry-relay/domain';
import { AsyncQueue } from '../streams/async-queue.js';
import { RateNegotiationError } from '../ingestion/errors.js';
import {
  RATE_SUCCESS,
  SET_RATE_RPC,
  attitudeEulerResponse,
  batteryResponse,
  connectionStateResponse,
  positionResponse,
  setRateResponse,
} from './responses.js';

const TAG = '[mavsdk]';

const CORE_SERVICE = 'mavsdk.rpc.core.CoreService';
const TELEMETRY_SERVICE = 'mavsdk.rpc.telemetry.TelemetryService';

export const DEFAULT_PROTO_DIR = join(__dirname, '..', '..', 'protos');

export interface MavsdkGrpcSourceOptions {
  /** host:port of the mavsdk_server gRPC endpoint */
  serverUrl: string;
  /** When set, this binary is spawned with the connection address. */
  serverBin?: string;
  protoDir?: string;
  /** How long to wait for the gRPC channel after `connect`. */
  readyTimeoutMs?: number;
}

function isServiceDefinition(def: AnyDefinition | undefined): def is ServiceDefinition {
  return def !== undefined && !('format' in def && typeof def.format === 'string');
}

function requireService(pkg: PackageDefinition, name: string): ServiceDefinition {
  const def = pkg[name];
  if (!isServiceDefinition(def)) throw new Error(`${name} missing from loaded protos`);
  return def;
}

export interface MavsdkServices {
  core: ServiceDefinition;
  telemetry: ServiceDefinition;
}

/** Loads the core and telemetry service definitions from `protoDir`. */
export function loadMavsdkServices(protoDir: string = DEFAULT_PROTO_DIR): MavsdkServices {
  const pkg = loadSync(['core.proto', 'telemetry.proto'], {
    includeDirs: [protoDir],
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
  });
  return {
    core: requireService(pkg, CORE_SERVICE),
    telemetry: requireService(pkg, TELEMETRY_SERVICE),
  };
}

/**
 * {@link TelemetrySourcePort} backed by a MAVSDK server over gRPC.
 * Every subscription is its own server-streaming call; `close` cancels them all.
 */
export class MavsdkGrpcSource implements TelemetrySourcePort {
  private readonly core: ServiceDefinition;
  private readonly telemetry: ServiceDefinition;
  private readonly calls = new Set<ClientReadableStream<object>>();
  private client: Client | null = null;
  private server: ChildProcess | null = null;
  private closed = false;

  constructor(private readonly options: MavsdkGrpcSourceOptions) {
    const services = loadMavsdkServices(options.protoDir);
    this.core = services.core;
    this.telemetry = services.telemetry;
  }

  async connect(address: string): Promise<void> {
    if (this.options.serverBin) this.spawnServer(this.options.serverBin, address);

    const client = new Client(this.options.serverUrl, credentials.createInsecure());
    this.client = client;

    const deadline = Date.now() + (this.options.readyTimeoutMs ?? 10_000);
    await new Promise<void>((resolve, reject) => {
      client.waitForReady(deadline, (err) => (err ? reject(err) : resolve()));
    });
  }

  connectionState(): AsyncIterable<ConnectionStateSample> {
    return this.subscribe(this.core, 'SubscribeConnectionState', connectionStateResponse);
  }

  position(): AsyncIterable<PositionSample> {
    return this.subscribe(this.telemetry, 'SubscribePosition', positionResponse);
  }

  attitudeEuler(): AsyncIterable<AttitudeSample> {
    return this.subscribe(this.telemetry, 'SubscribeAttitudeEuler', attitudeEulerResponse);
  }

  battery(): AsyncIterable<BatterySample> {
    return this.subscribe(this.telemetry, 'SubscribeBattery', batteryResponse);
  }

  async setRate(metric: RateMetric, rateHz: number): Promise<void> {
    const raw = await this.unary(this.telemetry, SET_RATE_RPC[metric], { rate_hz: rateHz });
    const parsed = setRateResponse.safeParse(raw);
    if (!parsed.success) throw new RateNegotiationError(metric, parsed.error.message);

    const result = parsed.data.telemetry_result;
    if (result?.result !== RATE_SUCCESS) {
      throw new RateNegotiationError(metric, result?.result_str || result?.result || 'no result');
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const call of this.calls) call.cancel();
    this.calls.clear();
    this.client?.close();
    this.client = null;
    if (this.server && this.server.exitCode === null) this.server.kill('SIGTERM');
    this.server = null;
  }

  private requireClient(): Client {
    if (!this.client) throw new Error('mavsdk source is not connected');
    return this.client;
  }

  private spawnServer(bin: string, address: string): void {
    const port = this.options.serverUrl.split(':').pop() ?? '50051';
    console.log(`${TAG} starting ${bin} on port ${port} for ${address}`);

    const server = spawn(bin, ['-p', port, address], { stdio: 'inherit' });
    server.on('error', (err) => console.error(`${TAG} mavsdk_server failed to start`, err));
    server.on('exit', (code, signal) => {
      if (!this.closed) console.error(`${TAG} mavsdk_server exited (code=${code}, signal=${signal})`);
    });
    this.server = server;
  }

  private method(service: ServiceDefinition, rpc: string) {
    const method = service[rpc];
    if (!method) throw new Error(`rpc ${rpc} not found`);
    return method;
  }

  private unary(service: ServiceDefinition, rpc: string, argument: object): Promise<object> {
    const client = this.requireClient();
    const method = this.method(service, rpc);
    return new Promise((resolve, reject) => {
      client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        argument,
        (err, response) => {
          if (err) reject(err);
          else if (response === undefined) reject(new Error(`${rpc} returned no response`));
          else resolve(response);
        },
      );
    });
  }

  private subscribe<T>(
    service: ServiceDefinition,
    rpc: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): AsyncIterable<T> {
    const client = this.requireClient();
    const method = this.method(service, rpc);
    const call: ClientReadableStream<object> = client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      {},
    );
    this.calls.add(call);
    const queue = new AsyncQueue<T>(() => call.cancel());

    call.on('data', (message: unknown) => {
      const parsed = schema.safeParse(message);
      if (parsed.success) queue.push(parsed.data);
      else queue.fail(new Error(`malformed ${rpc} response: ${parsed.error.message}`));
    });
    call.on('error', (err: Error) => {
      this.calls.delete(call);
      if (this.closed) queue.end();
      else queue.fail(err);
    });
    call.on('end', () => {
      this.calls.delete(call);
      queue.end();
    });

    return queue;
  }
}
