import type { MutationCoordinator } from '../core/MutationCoordinator.js';
import type { ReadonlyOscNode } from '../models/OscNode.js';
import { renderAttributes, renderClipModes, renderRange, renderUnits, renderValue } from '../models/nodeView.js';
import { Access, type JsonObject } from '../models/types.js';
import {
  AccessError,
  BadRequestError,
  NotFoundError,
  UnsupportedParamError,
  type OscQueryError,
} from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

export const NODE_QUERY_PARAMS = ['VALUE', 'TYPE', 'RANGE', 'CLIPMODE', 'ACCESS', 'DESCRIPTION', 'UNIT'] as const;
export type NodeQueryParam = (typeof NODE_QUERY_PARAMS)[number];
export type QueryParam = NodeQueryParam | 'HOST_INFO';

export interface HostInfo {
  name: string;
  oscIp: string;
  oscPort: number;
  oscTransport: 'UDP';
}

/** Read-only source of server-level metadata for HOST_INFO. */
export interface HostInfoProvider {
  hostInfo(): HostInfo;
}

export const EXTENSIONS = {
  ACCESS: true,
  VALUE: true,
  RANGE: true,
  DESCRIPTION: true,
  CLIPMODE: true,
  UNIT: true,
  LISTEN: true,
  PATH_CHANGED: true,
  PATH_ADDED: true,
  PATH_REMOVED: true,
  PATH_RENAMED: false,
  TAGS: false,
  EXTENDED_TYPE: false,
  CRITICAL: false,
  OVERLOADS: false,
  HTML: false,
} as const;

function isQueryParam(key: string): key is QueryParam {
  return key === 'HOST_INFO' || NODE_QUERY_PARAMS.some((param) => param === key);
}

/**
 * Parse the query string of a request (without the leading `?`). Only the keys matter:
 * `VALUE`, `VALUE=` and `VALUE=1` are the same request.
 */
export function parseQuery(rawQuery: string | undefined): Result<QueryParam | undefined, BadRequestError> {
  let keys: string[];
  try {
    keys = (rawQuery ?? '')
      .split('&')
      .filter((part) => part.length > 0)
      .map((part) => decodeURIComponent(part.split('=')[0]).toUpperCase());
  } catch {
    return err(new BadRequestError(`Malformed query string '${rawQuery ?? ''}'`));
  }

  if (keys.length === 0) return ok(undefined);
  if (keys.length > 1) {
    return err(new BadRequestError(`Only one query attribute is allowed, got ${keys.join(', ')}`));
  }
  const [key] = keys;
  if (!isQueryParam(key)) return err(new BadRequestError(`Unknown query attribute '${key}'`));
  return ok(key);
}

/** Resolves OSCQuery requests into JSON against the committed namespace. */
export class QueryResolver {
  constructor(
    private readonly coordinator: MutationCoordinator,
    private readonly hostInfoProvider: HostInfoProvider
  ) {}

  query(path: string, param?: QueryParam): Result<JsonObject> {
    if (param === 'HOST_INFO') return ok(this.hostInfo());

    return this.coordinator.read((namespace) => {
      const node = namespace.resolve(path);
      if (!node) return err(new NotFoundError(path));
      if (param === undefined) return ok(renderAttributes(node));
      return this.attribute(node, param);
    });
  }

  /** Parse and answer a raw `path?QUERY` pair in one step. */
  queryRaw(path: string, rawQuery: string | undefined): Result<JsonObject> {
    const param = parseQuery(rawQuery);
    if (!param.ok) return param;
    return this.query(path, param.value);
  }

  private attribute(node: ReadonlyOscNode, param: NodeQueryParam): Result<JsonObject, OscQueryError> {
    const unsupported = () => err(new UnsupportedParamError(param, node.fullPath));

    switch (param) {
      case 'VALUE':
        if (node.access === Access.WRITE_ONLY) {
          return err(new AccessError(`${node.fullPath} is write-only`, node.fullPath));
        }
        return node.isReadable ? ok({ VALUE: renderValue(node) }) : unsupported();
      case 'TYPE':
        return node.hasSlots ? ok({ TYPE: node.typeString }) : unsupported();
      case 'RANGE':
        return node.hasRange ? ok({ RANGE: renderRange(node) }) : unsupported();
      case 'CLIPMODE':
        return node.hasSlots ? ok({ CLIPMODE: renderClipModes(node) }) : unsupported();
      case 'ACCESS':
        return ok({ ACCESS: node.access });
      case 'DESCRIPTION':
        return node.description !== undefined ? ok({ DESCRIPTION: node.description }) : unsupported();
      case 'UNIT':
        return node.hasUnits ? ok({ UNIT: renderUnits(node) }) : unsupported();
      default: {
        const unreachable: never = param;
        return err(new BadRequestError(`Unhandled query attribute ${String(unreachable)}`));
      }
    }
  }

  private hostInfo(): JsonObject {
    const info = this.hostInfoProvider.hostInfo();
    return {
      NAME: info.name,
      OSC_TRANSPORT: info.oscTransport,
      OSC_IP: info.oscIp,
      OSC_PORT: info.oscPort,
      EXTENSIONS: { ...EXTENSIONS },
    };
  }
}
