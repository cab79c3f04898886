// packages/core/src/config/TextRuleRegistry.ts
import type { TextRule } from '../types/index.js';
import { TextRuleError } from '../errors/index.js';

export class TextRuleRegistry {
  private static readonly byName = new Map<string, TextRule>();

  static register(r: TextRule): void {
    if (this.byName.has(r.name)) throw new TextRuleError(`Text rule ${r.name} already registered`);
    this.byName.set(r.name, r);
  }
  static get(name: string): TextRule {
    const r = this.byName.get(name);
    if (!r) throw new TextRuleError(`Unknown text rule: ${name}`);
    return r;
  }
  static has(name: string): boolean { return this.byName.has(name); }
  static names(): string[]          { return [...this.byName.keys()]; }
}
