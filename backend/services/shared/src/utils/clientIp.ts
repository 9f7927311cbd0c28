// backend/services/shared/src/utils/clientIp.ts
/**
 * IP helpers for client-address resolution behind proxies.
 *
 * Notes:
 * - IPv4-mapped IPv6 peers ("::ffff:10.0.0.1") compare equal to their IPv4 form.
 * - Trusted proxies may be single addresses or CIDR ranges.
 */

import { BlockList, isIP } from "node:net";

const V4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/** Strip brackets and the IPv4-mapped prefix; returns "" when not an IP. */
export function normalizeIp(raw: string | undefined): string {
  if (!raw) return "";
  let s = raw.trim();
  if (s.startsWith("[") && s.endsWith("]")) s = s.slice(1, -1);
  const mapped = V4_MAPPED.exec(s);
  if (mapped) s = mapped[1];
  return isIP(s) ? s : "";
}

export function isValidIp(raw: string | undefined): boolean {
  return normalizeIp(raw) !== "";
}

export class TrustedProxies {
  private readonly list = new BlockList();
  readonly size: number;

  constructor(entries: readonly string[]) {
    let n = 0;
    for (const entry of entries) {
      const e = entry.trim();
      if (!e) continue;
      const [addr, prefix] = e.split("/");
      const ip = normalizeIp(addr);
      if (!ip) continue;
      const family = isIP(ip) === 6 ? "ipv6" : "ipv4";
      if (prefix !== undefined) {
        const bits = Number(prefix);
        if (!Number.isInteger(bits)) continue;
        this.list.addSubnet(ip, bits, family);
      } else {
        this.list.addAddress(ip, family);
      }
      n += 1;
    }
    this.size = n;
  }

  has(raw: string | undefined): boolean {
    const ip = normalizeIp(raw);
    if (!ip) return false;
    return this.list.check(ip, isIP(ip) === 6 ? "ipv6" : "ipv4");
  }
}
