import { existsSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { silentLogger, type BattleLogger } from "@emberfall/battle-engine";
import {
  CONTENT_DIRECTORIES,
  CONTENT_KINDS,
  type ContentBundle,
  type ContentDefinitionMap,
  type ContentKind,
} from "./types.js";
import { ContentValidationError, parseDefinition } from "./validators.js";

/** Read-only access to validated definitions. */
export interface ContentProvider {
  lookup<K extends ContentKind>(kind: K, id: string): ContentDefinitionMap[K] | undefined;
  /** Ids of every definition of a kind, sorted. */
  list(kind: ContentKind): string[];
}

type DefinitionStore = { [K in ContentKind]: Map<string, ContentDefinitionMap[K]> };

export interface InMemoryContentProviderOptions {
  logger?: BattleLogger;
}

export class InMemoryContentProvider implements ContentProvider {
  private readonly store: DefinitionStore = {
    region: new Map(),
    activity: new Map(),
    item: new Map(),
    enemy: new Map(),
  };
  private readonly logger: BattleLogger;

  constructor(options: InMemoryContentProviderOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  static fromBundle(bundle: ContentBundle, options: InMemoryContentProviderOptions = {}): InMemoryContentProvider {
    const provider = new InMemoryContentProvider(options);
    for (const kind of CONTENT_KINDS) {
      for (const raw of bundle[CONTENT_DIRECTORIES[kind]] ?? []) {
        provider.addRaw(kind, raw);
      }
    }
    return provider;
  }

  /** Validates and stores a raw definition. Ids are unique per kind. */
  addRaw<K extends ContentKind>(kind: K, raw: unknown, expectedId?: string): ContentDefinitionMap[K] {
    const definition = parseDefinition(kind, raw, expectedId);
    this.add(kind, definition);
    return definition;
  }

  add<K extends ContentKind>(kind: K, definition: ContentDefinitionMap[K]): void {
    const entries = this.store[kind];
    if (entries.has(definition.id)) {
      const issue = `id: duplicate ${kind} id "${definition.id}"`;
      throw new ContentValidationError(`Invalid ${kind} "${definition.id}": ${issue}`, kind, definition.id, [issue]);
    }
    entries.set(definition.id, definition);
    this.logger.debug(`Registered ${kind} ${definition.id}`);
  }

  lookup<K extends ContentKind>(kind: K, id: string): ContentDefinitionMap[K] | undefined {
    return this.store[kind].get(id);
  }

  list(kind: ContentKind): string[] {
    return [...this.store[kind].keys()].sort();
  }

  get size(): number {
    return CONTENT_KINDS.reduce((total, kind) => total + this.store[kind].size, 0);
  }
}

function readJson(kind: ContentKind, id: string, file: string): unknown {
  const text = readFileSync(file, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    const issue = `invalid JSON: ${detail}`;
    throw new ContentValidationError(`Invalid ${kind} "${id}": ${issue}`, kind, id, [issue]);
  }
}

/**
 * Loads `<root>/<regions|activities|items|enemies>/<id>.json`. A missing kind
 * directory means no definitions of that kind; a file whose `id` disagrees
 * with its name is rejected.
 */
export function loadContentDirectory(
  root: string,
  options: InMemoryContentProviderOptions = {},
): InMemoryContentProvider {
  const provider = new InMemoryContentProvider(options);
  for (const kind of CONTENT_KINDS) {
    const directory = path.join(root, CONTENT_DIRECTORIES[kind]);
    if (!existsSync(directory)) continue;

    const files = readdirSync(directory)
      .filter((name) => name.endsWith(".json"))
      .sort();
    for (const name of files) {
      const id = path.basename(name, ".json");
      provider.addRaw(kind, readJson(kind, id, path.join(directory, name)), id);
    }
  }
  options.logger?.info(`Loaded ${provider.size} content definitions`, { root });
  return provider;
}
