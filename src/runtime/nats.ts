// bandwatch/src/runtime/nats.ts
import {
  connect,
  type NatsConnection,
  type JetStreamClient,
  StringCodec,
} from "nats";
import type { EmittedRecord } from "../lib/types/snapshot.ts";
import type { EmissionSink } from "./interfaces.ts";

const sc = StringCodec();

/**
 * Subject a record is published on: <prefix>.<feed>.<kind>
 */
export function recordSubject(prefix: string, record: EmittedRecord): string {
  const feed = record.feed.replace(/[.\s*>]/g, "_");
  return `${prefix}.${feed}.${record.kind}`;
}

/**
 * NATS JetStream emission sink.
 * Connects on first publish; the stream covering the subjects must already exist.
 */
export class NatsEmissionSink implements EmissionSink {
  private nc: NatsConnection | null = null;
  private js: JetStreamClient | null = null;

  constructor(
    private servers: string,
    private subjectPrefix: string = "bandwatch",
  ) {}

  private async client(): Promise<JetStreamClient> {
    if (!this.js) {
      this.nc = await connect({ servers: this.servers });
      this.js = this.nc.jetstream();
      console.log(`Emission sink connected to NATS JetStream: ${this.servers}`);
    }
    return this.js;
  }

  async publish(record: EmittedRecord): Promise<void> {
    const js = await this.client();
    await js.publish(recordSubject(this.subjectPrefix, record), sc.encode(JSON.stringify(record)));
  }

  async close(): Promise<void> {
    if (this.nc) {
      await this.nc.drain();
      this.nc = null;
      this.js = null;
    }
  }
}
