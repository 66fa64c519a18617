import type { CompiledTemplate } from './templateData';

export class TemplateCache {
  private readonly templates = new Map<string, CompiledTemplate>();

  get(name: string): CompiledTemplate | undefined {
    return this.templates.get(name);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  set(name: string, template: CompiledTemplate): void {
    this.templates.set(name, template);
  }

  delete(name: string): boolean {
    return this.templates.delete(name);
  }

  clear(): void {
    this.templates.clear();
  }

  get size(): number {
    return this.templates.size;
  }

  names(): string[] {
    return [...this.templates.keys()];
  }
}
