import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { RuntimeLayout } from "../paths.js";
import { withFileLock, type FileLockOptions } from "./fileLock.js";
import { readJsonDocument, updateJsonDocument } from "./jsonDocument.js";

const RegistryEntrySchema = z.object({
  father: z.string(),
  workdir: z.string(),
});

export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

/**
 * Child ids are opaque keys. `z.record` drops keys such as `__proto__`, so
 * entries are validated one by one and rebuilt with `Object.fromEntries`,
 * which defines every key as an own property.
 */
const RegistryChildrenSchema = z
  .custom<object>((value) => typeof value === "object" && value !== null && !Array.isArray(value), {
    message: "Expected object",
  })
  .transform((raw, ctx) => {
    const entries: Array<[string, RegistryEntry]> = [];
    for (const [child, value] of Object.entries(raw)) {
      const parsed = RegistryEntrySchema.safeParse(value);
      if (!parsed.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [child],
          message: parsed.error.issues[0]?.message ?? "invalid registry entry",
        });
        return z.NEVER;
      }
      entries.push([child, parsed.data]);
    }
    return Object.fromEntries(entries);
  });

const RegistryDocumentSchema = z.object({
  children: RegistryChildrenSchema.default({}),
});

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>;

/** Entry enriched with the child id, as returned by {@link RelationshipRegistry.listChildren}. */
export interface RegistryChild extends RegistryEntry {
  readonly child: string;
}

export interface RelationshipRegistryOptions {
  readonly layout: RuntimeLayout;
  readonly lock: FileLockOptions;
  readonly logger?: StructuredLogger;
}

const emptyRegistry = (): RegistryDocument => ({ children: {} });

/**
 * Single shared document mapping child session ids to their parent and
 * working directory. Every access serialises on the global registry lock;
 * re-registering a child replaces the previous entry.
 */
export class RelationshipRegistry {
  private readonly layout: RuntimeLayout;
  private readonly lockOptions: FileLockOptions;
  private readonly logger?: StructuredLogger;

  constructor(options: RelationshipRegistryOptions) {
    this.layout = options.layout;
    this.lockOptions = options.lock;
    this.logger = options.logger;
  }

  async setChild(parent: string, child: string, workdir: string): Promise<void> {
    await withFileLock(
      this.layout.registryLock,
      () =>
        updateJsonDocument(
          this.layout.registryDocument,
          RegistryDocumentSchema,
          emptyRegistry,
          (current) => ({
            document: { ...current, children: { ...current.children, [child]: { father: parent, workdir } } },
            changed: true,
            result: undefined,
          }),
          {
            onCorrupt: "reset",
            onDiscard: ({ reason }) => this.logger?.warn("registry_reset", { reason }),
          },
        ),
      this.lockOptions,
    );
    this.logger?.info("registry_child_registered", { parent, child, workdir });
  }

  async getFather(child: string): Promise<string | undefined> {
    return (await this.lookup(child))?.father;
  }

  async getWorkdir(child: string): Promise<string | undefined> {
    return (await this.lookup(child))?.workdir;
  }

  async listChildren(): Promise<RegistryChild[]> {
    const document = await this.load();
    return Object.entries(document.children).map(([child, entry]) => ({ child, ...entry }));
  }

  private async lookup(child: string): Promise<RegistryEntry | undefined> {
    const document = await this.load();
    return Object.prototype.hasOwnProperty.call(document.children, child) ? document.children[child] : undefined;
  }

  private load(): Promise<RegistryDocument> {
    return withFileLock(
      this.layout.registryLock,
      () => readJsonDocument(this.layout.registryDocument, RegistryDocumentSchema, emptyRegistry()),
      this.lockOptions,
    );
  }
}
