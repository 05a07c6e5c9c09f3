/**
 * Peer Address Allocator
 *
 * Hands out tunnel addresses by advancing a host offset stored in the
 * configuration. The offset only moves forward: removing a peer never frees
 * its address. The offset is tied to the network it was counted in; an
 * offset recorded for another network counts as 0.
 */

import { AddressSpaceExhaustedError, ValidationError } from '../core/errors.js';
import { peerNetworkKey, peerOffsetKey } from '../state/keys.js';
import type { ConfigStore } from '../state/store.js';
import { formatIPv4, formatNetwork, parseIPv4, parseIPv4Cidr, subnetContains, type Subnet } from './address.js';

/**
 * Result of computing the next free address.
 */
export interface Allocation {
  /** Host offset from the network address */
  offset: number;
  /** Dotted-quad address */
  address: string;
}

/**
 * Store-backed allocator for one interface.
 */
export class AddressAllocator {
  private readonly subnet: Subnet;
  private readonly offsetKey: string;
  private readonly networkKey: string;

  /**
   * @param store - Store holding the last allocated offset
   * @param interfaceName - Interface the offset belongs to
   * @param serverCidr - Server address in CIDR notation
   */
  constructor(
    private readonly store: ConfigStore,
    interfaceName: string,
    serverCidr: string
  ) {
    this.subnet = parseIPv4Cidr(serverCidr, 'address');
    this.offsetKey = peerOffsetKey(interfaceName);
    this.networkKey = peerNetworkKey(interfaceName);
  }

  /** Network in CIDR notation, e.g. `10.253.0.0/24` */
  get network(): string {
    return formatNetwork(this.subnet);
  }

  /**
   * Last committed offset; 0 if none has been stored or it was stored for a
   * different network.
   *
   * @throws ValidationError if the stored value is not a non-negative integer
   */
  async lastOffset(): Promise<number> {
    const storedNetwork = await this.store.getOrDefault(this.networkKey, '');
    if (storedNetwork !== '' && storedNetwork !== this.network) {
      return 0;
    }
    const raw = await this.store.getOrDefault(this.offsetKey, '0');
    if (!/^\d+$/.test(raw)) {
      throw new ValidationError(`Stored peer offset is not a number: ${this.offsetKey}=${raw}`, this.offsetKey);
    }
    return Number.parseInt(raw, 10);
  }

  /**
   * Compute the next free address without persisting anything.
   *
   * @param taken - Addresses already held by peers; any outside the subnet are ignored
   * @throws AddressSpaceExhaustedError once the broadcast address is reached
   */
  async peekNextAddress(taken: Iterable<string> = []): Promise<Allocation> {
    const used = new Set<number>([this.subnet.address]);
    for (const address of taken) {
      const value = parseIPv4(address);
      if (subnetContains(this.subnet, value)) {
        used.add(value);
      }
    }

    const broadcastOffset = this.subnet.broadcast - this.subnet.network;
    let offset = await this.lastOffset();

    for (;;) {
      offset += 1;
      if (offset >= broadcastOffset) {
        throw new AddressSpaceExhaustedError(this.network);
      }
      const candidate = (this.subnet.network + offset) >>> 0;
      if (!used.has(candidate)) {
        return { offset, address: formatIPv4(candidate) };
      }
    }
  }

  /**
   * Persist an allocation returned by peekNextAddress.
   */
  async commit(allocation: Allocation): Promise<void> {
    await this.store.setMany({
      [this.offsetKey]: String(allocation.offset),
      [this.networkKey]: this.network,
    });
  }

  /**
   * Compute and persist the next address.
   */
  async allocateNextAddress(taken: Iterable<string> = []): Promise<string> {
    const allocation = await this.peekNextAddress(taken);
    await this.commit(allocation);
    return allocation.address;
  }
}
