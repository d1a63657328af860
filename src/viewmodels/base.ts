/**
 * rulestudio View-Model Base
 * Observable state shared by the CLI and the dashboard
 */

export type StateListener<State> = (state: State, previous: State) => void;

export abstract class ViewModel<State extends object> {
  private current: State;
  private readonly listeners = new Set<StateListener<State>>();

  protected constructor(initial: State) {
    this.current = initial;
  }

  get state(): State {
    return this.current;
  }

  setState(patch: Partial<State>): void {
    const previous = this.current;
    this.current = { ...previous, ...patch };
    for (const listener of this.listeners) {
      listener(this.current, previous);
    }
  }

  /**
   * Returns an unsubscribe function
   */
  subscribe(listener: StateListener<State>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
