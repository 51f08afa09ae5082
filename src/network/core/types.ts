/**
 * Core network types - IPv4 addressing used by topology discovery and routing
 *
 * Addresses are stored as four octets and converted to unsigned 32-bit
 * integers for masking, ordering and longest-prefix comparisons.
 */

// ─── IPv4 Address ────────────────────────────────────────────────────

export class IPAddress {
  private readonly octets: number[];

  constructor(ip: string | number[]) {
    if (typeof ip === 'string') {
      this.octets = IPAddress.parse(ip);
    } else {
      if (ip.length !== 4) throw new Error(`Invalid IP: expected 4 octets, got ${ip.length}`);
      for (const o of ip) {
        if (!Number.isInteger(o) || o < 0 || o > 255) throw new Error(`Invalid IP octet: ${o}`);
      }
      this.octets = [...ip];
    }
  }

  private static parse(ip: string): number[] {
    const parts = ip.split('.');
    if (parts.length !== 4) throw new Error(`Invalid IP address: ${ip}`);
    return parts.map(p => {
      const n = parseInt(p, 10);
      if (isNaN(n) || n < 0 || n > 255) throw new Error(`Invalid IP octet: ${p}`);
      return n;
    });
  }

  static any(): IPAddress {
    return new IPAddress([0, 0, 0, 0]);
  }

  equals(other: IPAddress): boolean {
    return this.octets.every((o, i) => o === other.octets[i]);
  }

  /** Numeric ordering, usable as an Array.sort comparator */
  static compare(a: IPAddress, b: IPAddress): number {
    return a.toUint32() - b.toUint32();
  }

  isInSameSubnet(other: IPAddress, mask: SubnetMask): boolean {
    const maskInt = mask.toUint32();
    return ((this.toUint32() & maskInt) >>> 0) === ((other.toUint32() & maskInt) >>> 0);
  }

  /** Network address of this IP under the given mask */
  getNetwork(mask: SubnetMask): IPAddress {
    return IPAddress.fromUint32((this.toUint32() & mask.toUint32()) >>> 0);
  }

  /** Convert to 32-bit unsigned integer (for LPM calculations) */
  toUint32(): number {
    return ((this.octets[0] << 24) | (this.octets[1] << 16) |
            (this.octets[2] << 8) | this.octets[3]) >>> 0;
  }

  static fromUint32(n: number): IPAddress {
    return new IPAddress([
      (n >>> 24) & 0xff,
      (n >>> 16) & 0xff,
      (n >>> 8) & 0xff,
      n & 0xff,
    ]);
  }

  getOctets(): number[] {
    return [...this.octets];
  }

  toString(): string {
    return this.octets.join('.');
  }

  toJSON(): string {
    return this.toString();
  }
}

// ─── Subnet Mask ─────────────────────────────────────────────────────

export class SubnetMask {
  private readonly octets: number[];

  constructor(mask: string | number[]) {
    if (typeof mask === 'string') {
      const parts = mask.split('.');
      if (parts.length !== 4) throw new Error(`Invalid subnet mask: ${mask}`);
      this.octets = parts.map(p => parseInt(p, 10));
    } else {
      this.octets = [...mask];
    }
    if (this.octets.some(o => isNaN(o) || o < 0 || o > 255)) {
      throw new Error(`Invalid subnet mask: ${this.octets.join('.')}`);
    }
    // Contiguous ones followed by zeros
    const inverted = (~this.toUint32()) >>> 0;
    if ((inverted & (inverted + 1)) !== 0) {
      throw new Error(`Invalid subnet mask: ${this.octets.join('.')} is not contiguous`);
    }
  }

  static fromCIDR(prefix: number): SubnetMask {
    if (!Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
      throw new Error(`Invalid prefix length: ${prefix}`);
    }
    const octets = [0, 0, 0, 0];
    for (let i = 0; i < prefix; i++) {
      octets[Math.floor(i / 8)] |= (128 >> (i % 8));
    }
    return new SubnetMask(octets);
  }

  /** 255.255.255.255, used for host routes */
  static host(): SubnetMask {
    return SubnetMask.fromCIDR(32);
  }

  equals(other: SubnetMask): boolean {
    return this.toUint32() === other.toUint32();
  }

  getOctets(): number[] {
    return [...this.octets];
  }

  /** Convert to 32-bit unsigned integer (for LPM calculations) */
  toUint32(): number {
    return ((this.octets[0] << 24) | (this.octets[1] << 16) |
            (this.octets[2] << 8) | this.octets[3]) >>> 0;
  }

  toCIDR(): number {
    let bits = 0;
    for (const octet of this.octets) {
      let b = octet;
      while (b & 128) {
        bits++;
        b = (b << 1) & 0xff;
      }
    }
    return bits;
  }

  toString(): string {
    return this.octets.join('.');
  }

  toJSON(): string {
    return this.toString();
  }
}

// ─── Interface Types ─────────────────────────────────────────────────

export type ConnectionType = 'serial' | 'ethernet' | 'fiber';

// ─── Utility ─────────────────────────────────────────────────────────

let idCounter = 0;

export function generateId(prefix: string = 'id'): string {
  idCounter++;
  return `${prefix}-${idCounter.toString(36)}`;
}

export function resetCounters(): void {
  idCounter = 0;
}
