/**
 * Caller name used for calls made outside any function body.
 */
export const GLOBAL_CALLER = 'GLOBAL';

export interface CallEdge {
  readonly caller: string;
  readonly callee: string;
}

/**
 * Position in the graph's append-only history, used to undo one file's
 * contributions when that file fails part-way through.
 */
export interface GraphCheckpoint {
  readonly nodeCount: number;
  readonly edgeCount: number;
}

function edgeKey(caller: string, callee: string): string {
  return `${caller}\u0000${callee}`;
}

/**
 * Run-wide record of declared functions and discovered calls.
 *
 * Both collections keep insertion order and reject exact duplicates, so the
 * first sighting of a node or edge is the only one that gets emitted.
 */
export class CallGraph {
  private readonly nodeList: string[] = [];
  private readonly nodeSet = new Set<string>();
  private readonly edgeList: CallEdge[] = [];
  private readonly edgeKeys = new Set<string>();

  /**
   * Record a declared function.
   * @returns true if the name was not seen before
   */
  addNode(name: string): boolean {
    if (this.nodeSet.has(name)) {
      return false;
    }
    this.nodeSet.add(name);
    this.nodeList.push(name);
    return true;
  }

  /**
   * Record a call.
   * @returns true if this exact (caller, callee) pair was not seen before
   */
  addEdge(caller: string, callee: string): boolean {
    const key = edgeKey(caller, callee);
    if (this.edgeKeys.has(key)) {
      return false;
    }
    this.edgeKeys.add(key);
    this.edgeList.push({ caller, callee });
    return true;
  }

  hasNode(name: string): boolean {
    return this.nodeSet.has(name);
  }

  hasEdge(caller: string, callee: string): boolean {
    return this.edgeKeys.has(edgeKey(caller, callee));
  }

  get nodes(): readonly string[] {
    return this.nodeList;
  }

  get edges(): readonly CallEdge[] {
    return this.edgeList;
  }

  checkpoint(): GraphCheckpoint {
    return { nodeCount: this.nodeList.length, edgeCount: this.edgeList.length };
  }

  /**
   * Drop every node and edge added after the checkpoint.
   */
  rollback(checkpoint: GraphCheckpoint): void {
    for (const name of this.nodeList.splice(checkpoint.nodeCount)) {
      this.nodeSet.delete(name);
    }
    for (const edge of this.edgeList.splice(checkpoint.edgeCount)) {
      this.edgeKeys.delete(edgeKey(edge.caller, edge.callee));
    }
  }
}
