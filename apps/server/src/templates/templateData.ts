/** Dynamic values handed to a template; templates read them as `data.<key>`. */
export interface TemplateData {
  data: Record<string, unknown>;
}

export interface CompiledTemplate {
  /** Page file name, relative to the templates directory. */
  name: string;
  /** Every file parsed into this template, in parse order. */
  files: string[];
  execute(td: TemplateData): string;
}

export const emptyTemplateData = (): TemplateData => ({ data: {} });
