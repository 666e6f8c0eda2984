import { UnsupportedTargetError } from '@shelfdb/core';

export interface StoreTarget {
  backend: 'sqlite';
  location: string;
  inMemory: boolean;
}

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/(.*)$/;

/**
 * Resolve a path or URL to a database location.
 *
 * Accepts plain paths, `:memory:`, `sqlite:///path` and `file:///path`.
 * PostgreSQL URLs are recognised but not implemented.
 */
export function resolveTarget(target: string): StoreTarget {
  if (!target) {
    throw new UnsupportedTargetError(`Unsupported or unknown database target: '${target}'`);
  }

  const match = SCHEME_PATTERN.exec(target);
  if (!match) {
    return sqliteTarget(target);
  }

  const scheme = match[1].toLowerCase();
  if (scheme === 'sqlite' || scheme === 'file') {
    return sqliteTarget(normalizeUrlPath(match[2]));
  }
  if (scheme === 'postgres' || scheme === 'postgresql') {
    throw new UnsupportedTargetError(
      'PostgreSQL backend is not implemented yet. Use a SQLite path or a sqlite:/// URL.'
    );
  }
  throw new UnsupportedTargetError(`Unsupported or unknown database target: '${target}'`);
}

function sqliteTarget(location: string): StoreTarget {
  const inMemory = location === ':memory:' || location === '';
  return { backend: 'sqlite', location: inMemory ? ':memory:' : location, inMemory };
}

function normalizeUrlPath(rest: string): string {
  let path = decodeURIComponent(rest);

  if (path === '' || path === '/' || path === ':memory:' || path === '/:memory:') {
    return ':memory:';
  }
  // Windows drive letters keep a leading slash in URLs: /C:/data/app.db
  if (/^\/[A-Za-z]:/.test(path)) {
    return path.slice(1);
  }
  // sqlite:///./relative.db
  if (path.startsWith('/./') || path.startsWith('/../')) {
    return path.slice(1);
  }
  path = path.replace(/^\/+/, '/');
  return path;
}
