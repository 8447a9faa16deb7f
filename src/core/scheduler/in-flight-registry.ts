/**
 * Ids of subscriptions currently being charged.
 * Shared by every caller that can start a tick in this process.
 */
export class InFlightRegistry {
  private readonly ids = new Set<string>();

  /**
   * Claim an id; false when someone else holds it
   */
  tryClaim(id: string): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    return true;
  }

  release(id: string): void {
    this.ids.delete(id);
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  list(): string[] {
    return [...this.ids];
  }

  clear(): void {
    this.ids.clear();
  }
}
