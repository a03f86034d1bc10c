import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { Access, CLIP_MODES, OSC_TYPE_TAGS, type NodeAttributes } from '../models/types.js';
import { ConfigError } from '../utils/errors.js';

const ACCESS_NAMES = {
  none: Access.NO_VALUE,
  r: Access.READ_ONLY,
  w: Access.WRITE_ONLY,
  rw: Access.READ_WRITE,
} as const;

const accessSchema = z.union([
  z.nativeEnum(Access),
  z.enum(['none', 'r', 'w', 'rw']).transform((name) => ACCESS_NAMES[name]),
]);

const slotSchema = z
  .object({
    type: z.enum(OSC_TYPE_TAGS),
    value: z.unknown().optional(),
    range: z
      .object({
        min: z.number().optional(),
        max: z.number().optional(),
        vals: z.array(z.number()).nonempty().optional(),
      })
      .strict()
      .optional(),
    clipMode: z.enum(CLIP_MODES).optional(),
    unit: z.string().optional(),
  })
  .strict();

const nodeSchema = z
  .object({
    path: z.string().startsWith('/'),
    access: accessSchema.default(Access.NO_VALUE),
    description: z.string().optional(),
    slots: z.array(slotSchema).optional(),
  })
  .strict();

const namespaceFileSchema = z
  .object({
    nodes: z.array(nodeSchema),
  })
  .strict();

export interface NodeDeclaration {
  path: string;
  attributes: NodeAttributes;
}

/**
 * Validate a parsed namespace document. Nodes are returned in file order, which is also
 * the order they are inserted in.
 */
export function parseNamespace(document: unknown, source = 'namespace'): NodeDeclaration[] {
  const parsed = namespaceFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid namespace file ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data.nodes.map((node) => ({
    path: node.path,
    attributes: {
      access: node.access,
      ...(node.description !== undefined ? { description: node.description } : {}),
      ...(node.slots !== undefined ? { slots: node.slots } : {}),
    },
  }));
}

export async function readNamespaceFile(filePath: string): Promise<NodeDeclaration[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read namespace file ${filePath}`, [error instanceof Error ? error.message : String(error)]);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Namespace file ${filePath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseNamespace(document, filePath);
}
