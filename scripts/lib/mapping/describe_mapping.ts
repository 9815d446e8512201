import type { MappingRules } from './types.js';

export interface MappingStatistics {
  categories: number;
  items: number;
  attributeItems: number;
  elementItems: number;
  numericItems: number;
  links: number;
  groupedLinks: number;
  relations: number;
  warnings: number;
}

export interface MappingArtifact {
  statistics: MappingStatistics;
  categories: Record<
    string,
    {
      element: string;
      grouping: string;
      keys: string[];
      multiplicity: string;
      items: Record<
        string,
        {
          location: string;
          xmlName: string;
          type: string | null;
          numeric: boolean;
          mandatory: boolean;
          enumeration?: string[];
        }
      >;
      parents: Array<{
        category: string;
        multiplicity: string;
        pairs: Array<{ child: string; parent: string }>;
      }>;
    }
  >;
  warnings: string[];
}

/** Plain JSON description of mapping rules, written by `build_mapping`. */
export function describeMappingRules(rules: MappingRules): MappingArtifact {
  const statistics: MappingStatistics = {
    categories: rules.categories.size,
    items: 0,
    attributeItems: 0,
    elementItems: 0,
    numericItems: 0,
    links: rules.fkMap.links.length,
    groupedLinks: rules.fkMap.links.filter((link) => link.origin === 'grouped').length,
    relations: rules.fkMap.relations.length,
    warnings: rules.warnings.length
  };

  const categories: MappingArtifact['categories'] = {};
  for (const category of rules.categories.values()) {
    const items: MappingArtifact['categories'][string]['items'] = {};
    for (const item of category.items.values()) {
      statistics.items += 1;
      if (item.location === 'attribute') {
        statistics.attributeItems += 1;
      } else {
        statistics.elementItems += 1;
      }
      if (item.numeric) {
        statistics.numericItems += 1;
      }

      items[item.name] = {
        location: item.location,
        xmlName: item.xmlName,
        type: item.typeCode,
        numeric: item.numeric,
        mandatory: item.mandatory,
        ...(item.enumeration.length > 0 ? { enumeration: [...item.enumeration] } : {})
      };
    }

    categories[category.name] = {
      element: category.elementName,
      grouping: category.grouping,
      keys: [...category.keys],
      multiplicity: category.multiplicity,
      items,
      parents: rules.fkMap.parentRelations(category.name).map((relation) => ({
        category: relation.parentCategory,
        multiplicity: relation.multiplicity,
        pairs: relation.pairs.map((pair) => ({ child: pair.childItem, parent: pair.parentItem }))
      }))
    };
  }

  return { statistics, categories, warnings: [...rules.warnings] };
}
