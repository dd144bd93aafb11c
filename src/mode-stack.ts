/// # mode stack
///
/// predicate entries live inside a description environment (`<dl>` in
/// html, `\begin{description}` in latex) while headings and prose do not.
/// rather than deciding at each call site whether to open or close one,
/// both backends ask the stack for the mode they need and it emits the
/// open and close markers.
///
/// the stack mirrors exactly what has been written: every open it emits
/// is matched by one close, in reverse order. the base modes passed to
/// the constructor were never opened by the stack and are never closed.

export interface ModeStackEvents<M extends string> {
  open(mode: M): void;
  close(mode: M): void;
}

export class ModeStack<M extends string> {
  private readonly stack: M[];
  private readonly base: number;

  constructor(
    private readonly events: ModeStackEvents<M>,
    base: readonly M[] = []
  ) {
    this.stack = [...base];
    this.base = base.length;
  }

  get top(): M | undefined {
    return this.stack[this.stack.length - 1];
  }

  /// modes currently open, innermost last.
  snapshot(): readonly M[] {
    return [...this.stack];
  }

  /// make `mode` the innermost mode: nothing if it already is, close the
  /// modes above it if it is further down, open it otherwise.
  need(mode: M): void {
    if (this.top === mode) return;
    if (this.stack.includes(mode)) {
      this.popTo(mode);
      return;
    }
    this.stack.push(mode);
    this.events.open(mode);
  }

  /// close modes until `mode` is on top or only the base is left.
  popTo(mode?: M): void {
    while (this.stack.length > this.base && this.top !== mode) {
      const closed = this.stack.pop();
      if (closed !== undefined) {
        this.events.close(closed);
      }
    }
  }

  closeAll(): void {
    this.popTo();
  }
}
