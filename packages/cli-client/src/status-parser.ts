/**
 * Turns `tailscale status --json` output into a StatusSnapshot.
 *
 * The JSON shape drifts between tailscale releases, so the schema is
 * permissive and every field is optional.
 */

import { z } from 'zod';
import { ConnectivityError, createStatusSnapshot } from '@tailwarden/types';
import type { Device, StatusSnapshot } from '@tailwarden/types';

// ═══════════════════════════════════════════════════════════════════════════
// RAW SCHEMA
// ═══════════════════════════════════════════════════════════════════════════

const NodeIdSchema = z.union([z.string(), z.number()]).nullable().optional();

export const RawPeerSchema = z
  .object({
    ID: NodeIdSchema,
    Id: NodeIdSchema,
    HostName: z.string().nullable().optional(),
    DNSName: z.string().nullable().optional(),
    OS: z.string().nullable().optional(),
    OSVersion: z.string().nullable().optional(),
    TailscaleIPs: z.union([z.string(), z.array(z.string())]).nullable().optional(),
    ExitNode: z.boolean().nullable().optional(),
    ExitNodeOption: z.boolean().nullable().optional(),
    ExitNodeAllowed: z.boolean().nullable().optional(),
    Online: z.boolean().nullable().optional(),
    Hostinfo: z.record(z.unknown()).nullable().optional(),
    HostInfo: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();
export type RawPeer = z.infer<typeof RawPeerSchema>;

export const RawStatusSchema = z
  .object({
    BackendState: z.string().nullable().optional(),
    Self: RawPeerSchema.nullable().optional(),
    Peer: z.record(RawPeerSchema).nullable().optional(),
    Peers: z.record(RawPeerSchema).nullable().optional(),
    ExitNodeStatus: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();
export type RawStatus = z.infer<typeof RawStatusSchema>;

const HOSTINFO_OS_KEYS = ['OS', 'OSVersion', 'OperatingSystem', 'OSName'] as const;
const EXIT_STATUS_ID_KEYS = ['ExitNodeID', 'ExitNodeId', 'ID', 'Id', 'PeerID', 'PeerId'] as const;
const EXIT_NODE_ID_KEYS = ['ID', 'Id', 'NodeID', 'NodeId', 'PeerID', 'PeerId'] as const;

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * 'laptop.tail1234.ts.net' -> 'laptop'
 */
export function shortHostname(fullName: string): string {
  const dot = fullName.indexOf('.');
  return dot > 0 ? fullName.slice(0, dot) : fullName;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

function stringEntries(source: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') {
      out[key] = value;
    }
  }
  return out;
}

function collectExitNodeIds(exitStatus: Record<string, unknown>): string[] {
  const ids: string[] = [];
  const pushString = (value: unknown) => {
    if (typeof value === 'string' && value) {
      ids.push(value);
    }
  };

  for (const key of EXIT_STATUS_ID_KEYS) {
    pushString(exitStatus[key]);
  }

  const exitNode = exitStatus['ExitNode'];
  if (isRecord(exitNode)) {
    for (const key of EXIT_NODE_ID_KEYS) {
      pushString(exitNode[key]);
    }
  }

  const idList = exitStatus['ExitNodeIDs'] ?? exitStatus['ExitNodeIds'];
  if (Array.isArray(idList)) {
    idList.forEach(pushString);
  }

  return ids;
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Build a Device from one `Self`/`Peer` entry. `key` is the map key of the
 * entry and stands in for a missing id or name.
 */
export function parsePeer(key: string, peer: RawPeer): Device {
  const rawHostinfo = peer.Hostinfo ?? peer.HostInfo ?? {};
  const hostinfo = stringEntries(rawHostinfo);
  if (!hostinfo['Hostname'] && peer.HostName) {
    hostinfo['Hostname'] = peer.HostName;
  }
  if (!hostinfo['DNSName'] && peer.DNSName) {
    hostinfo['DNSName'] = peer.DNSName;
  }

  const rawName = hostinfo['Hostname'] || peer.DNSName || key;

  const addresses = typeof peer.TailscaleIPs === 'string' ? [peer.TailscaleIPs] : (peer.TailscaleIPs ?? []);

  let os: string | undefined;
  for (const osKey of HOSTINFO_OS_KEYS) {
    os = nonEmpty(hostinfo[osKey]);
    if (os) break;
  }
  os = os ?? nonEmpty(peer.OS) ?? nonEmpty(peer.OSVersion);

  const rawId = peer.ID ?? peer.Id;
  const id = rawId !== null && rawId !== undefined && rawId !== '' ? String(rawId) : key;

  return {
    name: shortHostname(rawName),
    tailnetAddresses: addresses,
    os,
    online: peer.Online !== false,
    exitNodeOption: Boolean(peer.ExitNodeOption || peer.ExitNodeAllowed),
    isExitNode: Boolean(peer.ExitNode),
    hostinfo,
    id,
  };
}

/**
 * Validate and convert decoded `tailscale status --json` output.
 * Throws ConnectivityError when the document is not a status object.
 */
export function parseStatus(json: unknown): StatusSnapshot {
  const result = RawStatusSchema.safeParse(json);
  if (!result.success) {
    throw new ConnectivityError(`Invalid status JSON: ${result.error.issues[0]?.message ?? 'unexpected shape'}`);
  }
  const raw = result.data;

  const self = raw.Self ? parsePeer(String(raw.Self.ID || 'self'), raw.Self) : null;
  const peerEntries = Object.entries(raw.Peer ?? raw.Peers ?? {});
  const peers = peerEntries.map(([peerKey, peer]) => parsePeer(peerKey, peer));

  const all = self ? [self, ...peers] : peers;
  const byId = new Map<string, Device>();
  for (const device of all) {
    if (device.id) {
      byId.set(device.id, device);
    }
  }

  const exitStatus = raw.ExitNodeStatus ?? {};
  const activeIds = exitStatus['Active'] === false ? [] : collectExitNodeIds(exitStatus);

  let active: Device | null = null;
  for (const candidate of activeIds) {
    const device = byId.get(candidate);
    if (device) {
      // still local to this parse
      device.isExitNode = true;
      active = device;
      break;
    }
  }
  if (!active) {
    active = all.find((d) => d.isExitNode) ?? null;
  }

  return createStatusSnapshot({
    backendState: raw.BackendState ?? '',
    self,
    peers,
    activeExitNode: active,
  });
}

/**
 * Parse raw stdout. Tolerates noise printed before the JSON document.
 */
export function parseStatusOutput(output: string): StatusSnapshot {
  const start = output.indexOf('{');
  if (start < 0) {
    throw new ConnectivityError(`Invalid status JSON: no object found in ${JSON.stringify(output.slice(0, 200))}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(output.slice(start));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConnectivityError(`Invalid status JSON: ${reason}`, { cause: error });
  }
  return parseStatus(json);
}
