// mecab-lattice/node - Immutable snapshots of lattice nodes

import { NodeStatus, type RawNode } from './native.js';

export interface MecabNodeJson {
  surface: string;
  feature: string;
  status: keyof typeof NodeStatus;
  begin: number;
  length: number;
  posid: number;
  wcost: number;
  cost: number;
  prob: number;
  nbestIndex: number;
}

/**
 * One morpheme (or end-of-sentence marker) from a parsed lattice.
 *
 * Strings are copied out while the lattice is alive, so a MecabNode stays
 * valid after the lattice is cleared, re-parsed or destroyed.
 */
export class MecabNode {
  private constructor(
    readonly surface: string,
    readonly feature: string,
    readonly status: NodeStatus,
    /** Byte offset of the surface within the encoded sentence */
    readonly begin: number,
    /** Surface length in bytes */
    readonly length: number,
    /** Surface length in bytes, including preceding white space */
    readonly rlength: number,
    readonly id: number,
    readonly rcAttr: number,
    readonly lcAttr: number,
    readonly posid: number,
    readonly charType: number,
    readonly isBest: boolean,
    /** Forward log-sum, set in marginal-probability mode */
    readonly alpha: number,
    /** Backward log-sum, set in marginal-probability mode */
    readonly beta: number,
    /** Marginal probability, set in marginal-probability mode */
    readonly prob: number,
    readonly wcost: number,
    /** Best accumulated cost from the BOS node */
    readonly cost: number,
    /** Which n-best path this node belongs to, from 0 */
    readonly nbestIndex: number
  ) {
    Object.freeze(this);
  }

  static fromRaw(raw: RawNode, surface: string, feature: string, begin: number, nbestIndex = 0): MecabNode {
    return new MecabNode(
      surface,
      feature,
      toStatus(raw.stat),
      begin,
      raw.length,
      raw.rlength,
      raw.id,
      raw.rcAttr,
      raw.lcAttr,
      raw.posid,
      raw.charType,
      raw.isbest === 1,
      raw.alpha,
      raw.beta,
      raw.prob,
      raw.wcost,
      raw.cost,
      nbestIndex
    );
  }

  get end(): number {
    return this.begin + this.length;
  }

  isNormal(): boolean {
    return this.status === NodeStatus.Normal;
  }

  isUnknown(): boolean {
    return this.status === NodeStatus.Unknown;
  }

  isBos(): boolean {
    return this.status === NodeStatus.BeginningOfSentence;
  }

  isEos(): boolean {
    return this.status === NodeStatus.EndOfSentence;
  }

  isEon(): boolean {
    return this.status === NodeStatus.EndOfNbest;
  }

  toJSON(): MecabNodeJson {
    return {
      surface: this.surface,
      feature: this.feature,
      status: statusName(this.status),
      begin: this.begin,
      length: this.length,
      posid: this.posid,
      wcost: this.wcost,
      cost: this.cost,
      prob: this.prob,
      nbestIndex: this.nbestIndex
    };
  }
}

export function toStatus(stat: number): NodeStatus {
  switch (stat) {
    case NodeStatus.Normal:
      return NodeStatus.Normal;
    case NodeStatus.Unknown:
      return NodeStatus.Unknown;
    case NodeStatus.BeginningOfSentence:
      return NodeStatus.BeginningOfSentence;
    case NodeStatus.EndOfSentence:
      return NodeStatus.EndOfSentence;
    case NodeStatus.EndOfNbest:
      return NodeStatus.EndOfNbest;
    default:
      return NodeStatus.Unknown;
  }
}

function statusName(status: NodeStatus): keyof typeof NodeStatus {
  switch (status) {
    case NodeStatus.Normal:
      return 'Normal';
    case NodeStatus.Unknown:
      return 'Unknown';
    case NodeStatus.BeginningOfSentence:
      return 'BeginningOfSentence';
    case NodeStatus.EndOfSentence:
      return 'EndOfSentence';
    case NodeStatus.EndOfNbest:
      return 'EndOfNbest';
  }
}
