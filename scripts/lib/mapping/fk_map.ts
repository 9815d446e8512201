import type { Multiplicity } from '../metadata/types.js';

export interface ForeignKeyLink {
  childCategory: string;
  childItem: string;
  parentCategory: string;
  parentItem: string;
  origin: 'general' | 'grouped';
  linkGroupId: string | null;
}

export interface KeyPair {
  childItem: string;
  parentItem: string;
}

/** All links from one child category to one parent category. */
export interface ParentRelation {
  childCategory: string;
  parentCategory: string;
  pairs: readonly KeyPair[];
  multiplicity: Multiplicity;
  coversParentKey: boolean;
}

function linkKey(category: string, item: string): string {
  return `${category}\u0000${item}`;
}

/**
 * Child-to-parent relationship table. Holds at most one link per
 * (child category, child item); relations are kept in preference order.
 */
export class FkMap {
  private readonly linkIndex = new Map<string, ForeignKeyLink>();
  private readonly relationsByChild = new Map<string, ParentRelation[]>();
  private readonly childrenByParent = new Map<string, string[]>();

  constructor(links: ForeignKeyLink[], relations: ParentRelation[]) {
    for (const link of links) {
      const key = linkKey(link.childCategory, link.childItem);
      if (this.linkIndex.has(key)) {
        throw new Error(
          `Duplicate link for _${link.childCategory}.${link.childItem}; links must be deduplicated`
        );
      }
      this.linkIndex.set(key, link);
    }

    for (const relation of relations) {
      const forChild = this.relationsByChild.get(relation.childCategory) ?? [];
      forChild.push(relation);
      this.relationsByChild.set(relation.childCategory, forChild);

      const children = this.childrenByParent.get(relation.parentCategory) ?? [];
      if (!children.includes(relation.childCategory)) {
        children.push(relation.childCategory);
      }
      this.childrenByParent.set(relation.parentCategory, children);
    }
  }

  get links(): ForeignKeyLink[] {
    return Array.from(this.linkIndex.values());
  }

  get relations(): ParentRelation[] {
    return Array.from(this.relationsByChild.values()).flat();
  }

  linkFor(childCategory: string, childItem: string): ForeignKeyLink | undefined {
    return this.linkIndex.get(linkKey(childCategory, childItem));
  }

  parentRelations(childCategory: string): readonly ParentRelation[] {
    return this.relationsByChild.get(childCategory) ?? [];
  }

  relationBetween(childCategory: string, parentCategory: string): ParentRelation | undefined {
    return this.parentRelations(childCategory).find(
      (relation) => relation.parentCategory === parentCategory
    );
  }

  childCategories(parentCategory: string): readonly string[] {
    return this.childrenByParent.get(parentCategory) ?? [];
  }
}
