import { ClientType, type ClientMetadata, type ClientView } from '../types.js';
import type { TransportConnection } from '../transport/transport.js';

export type OpenConnections = () => Iterable<TransportConnection>;

interface Entry {
  meta: ClientMetadata;
  // Monotonic, so "most recently registered" is well defined even within one millisecond.
  registration: number;
}

/**
 * Side table of client metadata keyed by connection. Lookups only consider
 * connections the transport still reports as open; when several match, the
 * most recent registration wins.
 */
export class ClientDirectory {
  private readonly entries = new Map<TransportConnection, Entry>();
  private registrations = 0;

  constructor(private readonly openConnections: OpenConnections) {}

  attach(connection: TransportConnection, now: number): ClientMetadata {
    const meta: ClientMetadata = { clientType: ClientType.Unknown, connectedAt: now };
    this.entries.set(connection, { meta, registration: 0 });
    return meta;
  }

  detach(connection: TransportConnection): ClientMetadata | undefined {
    const entry = this.entries.get(connection);
    this.entries.delete(connection);
    return entry?.meta;
  }

  /** Returns false for connections that were never attached (or already closed). */
  register(connection: TransportConnection, clientType: string, clientUid: string, now: number): boolean {
    const entry = this.entries.get(connection);
    if (!entry) return false;
    const same = entry.meta.clientType === clientType && entry.meta.clientUid === clientUid;
    entry.meta.clientType = clientType;
    entry.meta.clientUid = clientUid;
    if (!same) {
      entry.meta.registeredAt = now;
      this.registrations += 1;
      entry.registration = this.registrations;
    }
    return true;
  }

  /** Another open connection already registered under `clientUid`, if any. */
  findUidConflict(connection: TransportConnection, clientUid: string): TransportConnection | undefined {
    for (const [conn, entry] of this.openEntries()) {
      if (conn !== connection && entry.meta.clientUid === clientUid) return conn;
    }
    return undefined;
  }

  get(connection: TransportConnection): ClientMetadata | undefined {
    return this.entries.get(connection)?.meta;
  }

  findByType(clientType: string): TransportConnection | undefined {
    return this.latest((meta) => meta.clientType === clientType);
  }

  findByUid(clientUid: string): TransportConnection | undefined {
    return this.latest((meta) => meta.clientUid === clientUid);
  }

  list(): ClientView[] {
    return [...this.openEntries()].map(([conn, entry]) => ({
      connectionId: conn.id,
      remoteAddress: conn.remoteAddress,
      ...entry.meta
    }));
  }

  countRegistered(): number {
    let n = 0;
    for (const [, entry] of this.openEntries()) if (entry.meta.clientType !== ClientType.Unknown) n += 1;
    return n;
  }

  private latest(match: (meta: ClientMetadata) => boolean): TransportConnection | undefined {
    let best: { conn: TransportConnection; registration: number } | undefined;
    for (const [conn, entry] of this.openEntries()) {
      if (!match(entry.meta)) continue;
      if (!best || entry.registration > best.registration) best = { conn, registration: entry.registration };
    }
    return best?.conn;
  }

  private *openEntries(): Generator<[TransportConnection, Entry]> {
    for (const conn of this.openConnections()) {
      if (!conn.isOpen()) continue;
      const entry = this.entries.get(conn);
      if (entry) yield [conn, entry];
    }
  }
}
