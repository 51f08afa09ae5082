/**
 * SPFTree - Vertex arena for one SPF computation (RFC 2328 §16.1)
 *
 * Vertices live in a flat table and refer to each other by integer handle,
 * so parent/child links are plain indices. The whole arena belongs to one
 * run and is dropped once routes have been extracted.
 */

import { IPAddress, SubnetMask } from '../../core/types';
import type { RouterLSA } from '../RouterLSA';
import type { SPFStatus, VertexType } from '../types';

export type VertexHandle = number;

export interface SPFVertex {
  handle: VertexHandle;
  vertexType: VertexType;
  /** Router ID, or network address for network vertices */
  vertexId: IPAddress;
  /** Network mask (network vertices only) */
  mask: SubnetMask | null;
  distanceFromRoot: number;
  status: SPFStatus;
  parents: VertexHandle[];
  children: VertexHandle[];
  /** Router-LSA (router vertices only) */
  lsa: RouterLSA | null;
}

export class SPFTree {
  private vertices: SPFVertex[] = [];
  private index: Map<string, VertexHandle> = new Map();
  /** Handles in the order they entered the tree */
  private treeOrder: VertexHandle[] = [];

  static vertexKey(vertexType: VertexType, vertexId: IPAddress, mask: SubnetMask | null): string {
    return vertexType === 'router'
      ? `router:${vertexId}`
      : `network:${vertexId}/${mask ? mask.toCIDR() : 32}`;
  }

  addVertex(
    vertexType: VertexType,
    vertexId: IPAddress,
    mask: SubnetMask | null,
    lsa: RouterLSA | null,
    distanceFromRoot: number,
  ): VertexHandle {
    const key = SPFTree.vertexKey(vertexType, vertexId, mask);
    if (this.index.has(key)) throw new Error(`SPF vertex ${key} already exists`);

    const handle = this.vertices.length;
    this.vertices.push({
      handle,
      vertexType,
      vertexId,
      mask,
      distanceFromRoot,
      status: 'not-explored',
      parents: [],
      children: [],
      lsa,
    });
    this.index.set(key, handle);
    return handle;
  }

  find(vertexType: VertexType, vertexId: IPAddress, mask: SubnetMask | null): VertexHandle | null {
    return this.index.get(SPFTree.vertexKey(vertexType, vertexId, mask)) ?? null;
  }

  get(handle: VertexHandle): SPFVertex {
    const vertex = this.vertices[handle];
    if (!vertex) throw new RangeError(`No SPF vertex with handle ${handle}`);
    return vertex;
  }

  /** The root is the first vertex added; null for an empty tree */
  getRoot(): SPFVertex | null {
    return this.vertices[0] ?? null;
  }

  /**
   * Move a vertex into the tree and link it as a child of each parent.
   */
  markInTree(handle: VertexHandle): void {
    const vertex = this.get(handle);
    vertex.status = 'in-tree';
    vertex.lsa?.setStatus('in-tree');
    for (const p of vertex.parents) {
      this.get(p).children.push(handle);
    }
    this.treeOrder.push(handle);
  }

  getVertices(): SPFVertex[] {
    return [...this.vertices];
  }

  /** In-tree vertices, in the order they were added to the tree */
  getTreeVertices(): SPFVertex[] {
    return this.treeOrder.map(h => this.get(h));
  }

  get size(): number {
    return this.vertices.length;
  }

  /**
   * Candidate ordering: distance, then vertex ID, routers before networks,
   * then shorter mask.
   */
  compare(a: VertexHandle, b: VertexHandle): number {
    const va = this.get(a);
    const vb = this.get(b);
    if (va.distanceFromRoot !== vb.distanceFromRoot) return va.distanceFromRoot - vb.distanceFromRoot;
    const byId = IPAddress.compare(va.vertexId, vb.vertexId);
    if (byId !== 0) return byId;
    if (va.vertexType !== vb.vertexType) return va.vertexType === 'router' ? -1 : 1;
    return (va.mask?.toCIDR() ?? 32) - (vb.mask?.toCIDR() ?? 32);
  }
}
