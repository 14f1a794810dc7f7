import type { AnyType } from "./descriptor";

/**
 * Render a descriptor for diagnostics, e.g. `optional<list<User>>`.
 * Composites and lazies print their name only.
 */
export function formatType(type: AnyType): string {
  switch (type.kind) {
    case "primitive":
    case "struct":
    case "enum":
    case "lazy":
      return type.name;
    case "optional":
    case "list":
    case "set":
      return `${type.kind}<${formatType(type.element)}>`;
    case "tuple": {
      const parts = type.items.map(formatType);
      if (type.rest) parts.push(`...${formatType(type.rest)}`);
      return `tuple<${parts.join(", ")}>`;
    }
    case "dict":
      return `dict<${formatType(type.value)}>`;
    case "map":
      return `map<${formatType(type.keyType)}, ${formatType(type.value)}>`;
    case "union":
      return type.members.map(formatType).join(" | ");
    case "literal":
      return type.values.map(v => JSON.stringify(v)).join(" | ");
  }
}
