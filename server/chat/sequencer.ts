/**
 * 序号分配器
 *
 * assign() 只计算下一个位置，不消耗；confirm() 在插入提交成功后才推进。
 * 两者都在存储层的同步事务内调用，因此序号分配与持久化不可分割，
 * 插入失败不会留下空洞。
 */

export interface SequenceAssignment {
  sequence: number;
  createdAtMs: number;
}

export interface SequencerState {
  /** 已提交的最大序号，空库为 0 */
  lastSequence: number;
  /** 最大序号对应的提交时间，空库为 0 */
  lastCreatedAtMs: number;
}

export type Clock = () => number;

export class Sequencer {
  private lastSequence: number;
  private lastCreatedAtMs: number;

  constructor(resume: SequencerState, private readonly clock: Clock = Date.now) {
    this.lastSequence = resume.lastSequence;
    this.lastCreatedAtMs = resume.lastCreatedAtMs;
  }

  assign(): SequenceAssignment {
    // 墙钟回拨时沿用上一条的时间，保证 createdAtMs 随 sequence 单调不减
    return {
      sequence: this.lastSequence + 1,
      createdAtMs: Math.max(this.clock(), this.lastCreatedAtMs),
    };
  }

  confirm(assignment: SequenceAssignment): void {
    if (assignment.sequence !== this.lastSequence + 1) {
      throw new Error(
        `Sequence ${assignment.sequence} confirmed out of order (expected ${this.lastSequence + 1})`,
      );
    }
    this.lastSequence = assignment.sequence;
    this.lastCreatedAtMs = assignment.createdAtMs;
  }

  get current(): SequencerState {
    return { lastSequence: this.lastSequence, lastCreatedAtMs: this.lastCreatedAtMs };
  }
}
