import type { Category, DataBlock, DataContainer } from '../records/record_store.js';

export interface SingleCategoryValidator {
  kind: 'single-category';
  name: string;
  category: string;
  validate(category: Category, block: DataBlock): string[];
}

export interface CrossCategoryValidator {
  kind: 'cross-category';
  name: string;
  categories: readonly [string, string];
  validate(first: Category, second: Category, block: DataBlock): string[];
}

export type Validator = SingleCategoryValidator | CrossCategoryValidator;

/** Caller-owned set of extra content checks, run with the strict content gate. */
export class ValidatorRegistry {
  private readonly validators: Validator[] = [];

  register(validator: Validator): this {
    if (this.validators.some((existing) => existing.name === validator.name)) {
      throw new Error(`Validator '${validator.name}' is already registered`);
    }
    this.validators.push(validator);
    return this;
  }

  get size(): number {
    return this.validators.length;
  }

  run(container: DataContainer): string[] {
    const errors: string[] = [];
    for (const block of container.blocks) {
      for (const validator of this.validators) {
        const issues = this.runOne(validator, block);
        errors.push(...issues.map((issue) => `${block.name}/${validator.name}: ${issue}`));
      }
    }
    return errors;
  }

  private runOne(validator: Validator, block: DataBlock): string[] {
    if (validator.kind === 'single-category') {
      const category = block.getCategory(validator.category);
      return category ? validator.validate(category, block) : [];
    }

    const [firstName, secondName] = validator.categories;
    const first = block.getCategory(firstName);
    const second = block.getCategory(secondName);
    return first && second ? validator.validate(first, second, block) : [];
  }
}
