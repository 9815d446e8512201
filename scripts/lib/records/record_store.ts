import { StructuralValidationError } from '../errors.js';
import { UNKNOWN_VALUE } from './null_values.js';

export type Row = Record<string, string>;

/** `{ block: { category: rows } }`, the flat interchange shape. */
export type FlatRecords = Record<string, Record<string, Row[]>>;

export function normalizeCategoryName(name: string): string {
  return name.startsWith('_') ? name.slice(1) : name;
}

/**
 * One table of same-length item columns. Rows are never stored, only
 * computed from the columns.
 */
export class Category {
  readonly name: string;
  private readonly columns = new Map<string, string[]>();
  private length = 0;

  constructor(name: string, columns: Iterable<[string, string[]]> = []) {
    this.name = normalizeCategoryName(name);
    for (const [item, values] of columns) {
      this.addItem(item, values);
    }
  }

  static fromRows(name: string, rows: Row[]): Category {
    const category = new Category(name);
    for (const row of rows) {
      category.appendRow(row);
    }
    return category;
  }

  get rowCount(): number {
    return this.length;
  }

  get itemNames(): string[] {
    return Array.from(this.columns.keys());
  }

  hasItem(item: string): boolean {
    return this.columns.has(item);
  }

  values(item: string): readonly string[] {
    const column = this.columns.get(item);
    if (!column) {
      throw new Error(`Category '${this.name}' has no item '${item}'`);
    }
    return column;
  }

  value(item: string, rowIndex: number): string {
    return this.columns.get(item)?.[rowIndex] ?? UNKNOWN_VALUE;
  }

  addItem(item: string, values: string[]): void {
    if (this.columns.has(item)) {
      throw new StructuralValidationError(`Duplicate item '${item}' in category '${this.name}'`);
    }
    if (this.columns.size > 0 && values.length !== this.length) {
      throw new StructuralValidationError(
        `Item '${item}' of category '${this.name}' has ${values.length} values, expected ${this.length}`
      );
    }
    if (this.columns.size === 0) {
      this.length = values.length;
    }
    this.columns.set(item, [...values]);
  }

  appendRow(row: Row): void {
    for (const item of Object.keys(row)) {
      if (!this.columns.has(item)) {
        this.columns.set(item, new Array<string>(this.length).fill(UNKNOWN_VALUE));
      }
    }
    for (const [item, column] of this.columns) {
      column.push(row[item] ?? UNKNOWN_VALUE);
    }
    this.length += 1;
  }

  row(rowIndex: number): Row {
    if (rowIndex < 0 || rowIndex >= this.length) {
      throw new RangeError(`Row ${rowIndex} is out of range for category '${this.name}'`);
    }
    const row: Row = {};
    for (const [item, column] of this.columns) {
      row[item] = column[rowIndex];
    }
    return row;
  }

  *rows(): IterableIterator<Row> {
    for (let index = 0; index < this.length; index += 1) {
      yield this.row(index);
    }
  }

  toRows(): Row[] {
    return Array.from(this.rows());
  }
}

export class DataBlock {
  readonly name: string;
  private readonly categoryMap = new Map<string, Category>();

  constructor(name: string, categories: Category[] = []) {
    this.name = name;
    for (const category of categories) {
      this.addCategory(category);
    }
  }

  static fromFlatRecords(name: string, records: Record<string, Row[]>): DataBlock {
    const block = new DataBlock(name);
    for (const [categoryName, rows] of Object.entries(records)) {
      block.addCategory(Category.fromRows(categoryName, rows));
    }
    return block;
  }

  get categoryNames(): string[] {
    return Array.from(this.categoryMap.keys());
  }

  get categories(): Category[] {
    return Array.from(this.categoryMap.values());
  }

  hasCategory(name: string): boolean {
    return this.categoryMap.has(normalizeCategoryName(name));
  }

  getCategory(name: string): Category | undefined {
    return this.categoryMap.get(normalizeCategoryName(name));
  }

  addCategory(category: Category): void {
    if (this.categoryMap.has(category.name)) {
      throw new StructuralValidationError(
        `Duplicate category '${category.name}' in block '${this.name}'`
      );
    }
    this.categoryMap.set(category.name, category);
  }

  toFlatRecords(): Record<string, Row[]> {
    const records: Record<string, Row[]> = {};
    for (const category of this.categoryMap.values()) {
      records[category.name] = category.toRows();
    }
    return records;
  }
}

export class DataContainer {
  private readonly blockMap = new Map<string, DataBlock>();

  constructor(blocks: DataBlock[] = []) {
    for (const block of blocks) {
      this.addBlock(block);
    }
  }

  static fromFlatRecords(records: FlatRecords): DataContainer {
    return new DataContainer(
      Object.entries(records).map(([name, categories]) => DataBlock.fromFlatRecords(name, categories))
    );
  }

  get blockNames(): string[] {
    return Array.from(this.blockMap.keys());
  }

  get blocks(): DataBlock[] {
    return Array.from(this.blockMap.values());
  }

  getBlock(name: string): DataBlock | undefined {
    return this.blockMap.get(name);
  }

  addBlock(block: DataBlock): void {
    if (this.blockMap.has(block.name)) {
      throw new StructuralValidationError(`Duplicate data block '${block.name}'`);
    }
    this.blockMap.set(block.name, block);
  }

  toFlatRecords(): FlatRecords {
    const records: FlatRecords = {};
    for (const block of this.blockMap.values()) {
      records[block.name] = block.toFlatRecords();
    }
    return records;
  }
}
