/**
 * Model options and the analysis methods a document supports.
 */

export interface ModelOption {
  name: string;
  value: string;
}

export interface SupportedMethods {
  symbolic: boolean;
  stochastic: boolean;
  concrete: boolean;
}

export const DEFAULT_SUPPORTED_METHODS: Readonly<SupportedMethods> = Object.freeze({
  symbolic: true,
  stochastic: true,
  concrete: true,
});

export function option(name: string, value: string): ModelOption {
  return { name, value };
}

/** Last option named `name`; later entries override earlier ones. */
export function findOption(options: readonly ModelOption[], name: string): ModelOption | undefined {
  for (let i = options.length - 1; i >= 0; i--) {
    if (options[i].name === name) return options[i];
  }
  return undefined;
}
