import { crewError } from "../errors.js";
import { isUserInput, preview } from "../messages/index.js";
import type { CanonicalMessage } from "../messages/types.js";

export interface Turn {
  /** The user message that opened the turn. */
  anchor: CanonicalMessage;
  /** Canonical index of the anchor; the log length a jump to this turn restores. */
  boundaryIndex: number;
}

export class TurnIndex {
  private turns: Turn[] = [];

  get length(): number {
    return this.turns.length;
  }

  list(): readonly Turn[] {
    return this.turns;
  }

  /** Called after a terminal assistant response, never after tool rounds. */
  record(anchorIndex: number, anchor: CanonicalMessage): Turn {
    const last = this.turns[this.turns.length - 1];
    if (last && anchorIndex <= last.boundaryIndex) {
      throw crewError("rewind_error", `Turn boundary ${anchorIndex} is not after ${last.boundaryIndex}`);
    }
    const turn: Turn = { anchor, boundaryIndex: anchorIndex };
    this.turns.push(turn);
    return turn;
  }

  /** 1-based lookup; throws a rewind_error for anything outside 1..length. */
  get(turnNumber: number): Turn {
    if (!Number.isInteger(turnNumber) || turnNumber < 1 || turnNumber > this.turns.length) {
      throw crewError(
        "rewind_error",
        this.turns.length === 0
          ? `Invalid turn ${turnNumber}: no turns recorded`
          : `Invalid turn ${turnNumber}: expected 1..${this.turns.length}`,
      );
    }
    return this.turns[turnNumber - 1];
  }

  truncate(count: number): void {
    this.turns = this.turns.slice(0, Math.max(0, count));
  }

  clear(): void {
    this.turns = [];
  }

  /**
   * Re-derive turns from a loaded log: every user input later answered by
   * an assistant message opens a turn.
   */
  rebuild(log: readonly CanonicalMessage[]): void {
    this.turns = [];
    let open: number | undefined;
    log.forEach((msg, index) => {
      if (isUserInput(msg)) {
        open = index;
      } else if (msg.role === "assistant" && open !== undefined) {
        this.turns.push({ anchor: log[open], boundaryIndex: open });
        open = undefined;
      }
    });
  }

  /** One line per turn, for listings. */
  describe(): string[] {
    return this.turns.map((t, i) => `${i + 1}. ${preview(t.anchor, 60)}`);
  }
}
