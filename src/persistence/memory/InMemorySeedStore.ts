import { SeedStore } from '../../cluster/types';

export class InMemorySeedStore implements SeedStore {
  private seeds: string[] = [];

  getSeeds(): string[] {
    return [...this.seeds];
  }

  setSeeds(seeds: string[]): void {
    // Set semantics: keep first occurrence order
    this.seeds = Array.from(new Set(seeds));
  }

  hasSeed(host: string): boolean {
    return this.seeds.includes(host);
  }

  clear(): void {
    this.seeds = [];
  }
}
