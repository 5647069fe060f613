import {
  ProviderGroup,
  VariableDefinition,
} from './catalog.types';
import { UnknownVariableError } from '../forecast/forecast.errors';

export interface VariableGrouping {
  groups: Map<ProviderGroup, string[]>;
  unknown: string[];
}

/**
 * Immutable variable -> provider group registry.
 * Built once per catalog snapshot and never mutated afterwards.
 */
export class VariableCatalog {
  private readonly definitions: ReadonlyMap<string, Readonly<VariableDefinition>>;

  constructor(definitions: VariableDefinition[]) {
    const byName = new Map<string, Readonly<VariableDefinition>>();
    for (const definition of definitions) {
      if (byName.has(definition.variableName)) {
        throw new Error(
          `Duplicate variable in catalog: ${definition.variableName}`,
        );
      }
      byName.set(definition.variableName, Object.freeze({ ...definition }));
    }
    this.definitions = byName;
  }

  get size(): number {
    return this.definitions.size;
  }

  lookup(variableName: string): ProviderGroup | undefined {
    return this.definitions.get(variableName)?.providerGroup;
  }

  describe(variableName: string): Readonly<VariableDefinition> | undefined {
    return this.definitions.get(variableName);
  }

  list(): Readonly<VariableDefinition>[] {
    return Array.from(this.definitions.values());
  }

  /**
   * Partition variables by provider group. Unknown names are collected rather
   * than failing on the first one. Order follows first appearance.
   */
  groupsFor(variables: string[]): VariableGrouping {
    const groups = new Map<ProviderGroup, string[]>();
    const unknown: string[] = [];
    const seen = new Set<string>();

    for (const variable of variables) {
      if (seen.has(variable)) continue;
      seen.add(variable);

      const group = this.lookup(variable);
      if (group === undefined) {
        unknown.push(variable);
        continue;
      }

      const members = groups.get(group);
      if (members) {
        members.push(variable);
      } else {
        groups.set(group, [variable]);
      }
    }

    return { groups, unknown };
  }

  requireGroupsFor(variables: string[]): Map<ProviderGroup, string[]> {
    const { groups, unknown } = this.groupsFor(variables);
    if (unknown.length > 0) {
      throw new UnknownVariableError(unknown);
    }
    return groups;
  }

  variablesByGroup(): Record<ProviderGroup, string[]> {
    const result: Record<ProviderGroup, string[]> = {};
    for (const definition of this.definitions.values()) {
      (result[definition.providerGroup] ??= []).push(definition.variableName);
    }
    return result;
  }
}
