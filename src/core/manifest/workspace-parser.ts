/**
 * Workspace (go.work) parser.
 *
 * Shares the tokenizer and the replace rule with the manifest grammar.
 * `use` directives are resolved to the manifest files they point at.
 */

import { dirname, join } from 'path';
import { FILE_PATTERNS, GO_VERSIONS, GRAMMAR, WORKSPACE_DIRECTIVES } from '../../constants/index.js';
import type { GoVersion, Outcome, ParsedWorkspace, ReplaceMap } from '../../types/index.js';
import { ParseError } from '../../utils/errors.js';
import { parseGoDirective, parseReplaceDirective, recordReplace } from './directives.js';
import { normalizeWhitespace, tokenizeLine } from './tokenizer.js';

type WorkspaceDirective = (typeof WORKSPACE_DIRECTIVES)[number];

interface UseEntry {
  path: string;
  line: number;
}

function isWorkspaceDirective(token: string): token is WorkspaceDirective {
  return WORKSPACE_DIRECTIVES.some(directive => directive === token);
}

export function parseWorkspace(content: string, file: string): Outcome<ParsedWorkspace, ParseError> {
  let go: GoVersion | undefined;
  const uses: UseEntry[] = [];
  const replace: ReplaceMap = new Map();

  let currentDirective: 'use' | 'replace' | null = null;
  let blockLine = 0;
  const lines = normalizeWhitespace(content).split('\n');

  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const tokenized = tokenizeLine(lines[index], file, lineNo);
    if (!tokenized.success) {
      return tokenized;
    }
    const { tokens } = tokenized.data;
    if (tokens.length === 0) {
      continue;
    }

    if (currentDirective) {
      if (tokens[0] === GRAMMAR.BLOCK_CLOSE) {
        if (tokens.length > 1) {
          return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[1]}' after ')'`) };
        }
        currentDirective = null;
      } else if (currentDirective === 'use') {
        if (tokens.length !== 1) {
          return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[1]}' in 'use' block`) };
        }
        uses.push({ path: tokens[0], line: lineNo });
      } else {
        const entry = parseReplaceDirective(tokens, file, lineNo);
        if (!entry.success) {
          return entry;
        }
        recordReplace(replace, entry.data);
      }
      continue;
    }

    const keyword = tokens[0];
    if (!isWorkspaceDirective(keyword)) {
      return { success: false, error: new ParseError(file, lineNo, `unexpected directive '${keyword}'`) };
    }
    if (tokens.length === 1) {
      return { success: false, error: new ParseError(file, lineNo, `expected another token after '${keyword}'`) };
    }

    switch (keyword) {
      case 'go': {
        const parsed = parseGoDirective(tokens, go, file, lineNo);
        if (!parsed.success) {
          return parsed;
        }
        go = parsed.data;
        break;
      }

      case 'use': {
        if (tokens.length !== 2) {
          return { success: false, error: new ParseError(file, lineNo, "expected path or block in 'use' directive") };
        }
        if (tokens[1] === GRAMMAR.BLOCK_OPEN) {
          currentDirective = 'use';
          blockLine = lineNo;
        } else {
          uses.push({ path: tokens[1], line: lineNo });
        }
        break;
      }

      case 'replace': {
        if (tokens[1] === GRAMMAR.BLOCK_OPEN) {
          if (tokens.length > 2) {
            return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[2]}' after '('`) };
          }
          currentDirective = 'replace';
          blockLine = lineNo;
          break;
        }
        const entry = parseReplaceDirective(tokens.slice(1), file, lineNo);
        if (!entry.success) {
          return entry;
        }
        recordReplace(replace, entry.data);
        break;
      }
    }
  }

  if (currentDirective) {
    return { success: false, error: new ParseError(file, blockLine, `unclosed '${currentDirective}' block`) };
  }

  const manifests: string[] = [];
  for (const use of uses) {
    const manifest = resolveUseDirective(use.path, file, use.line);
    if (!manifest.success) {
      return manifest;
    }
    manifests.push(manifest.data);
  }

  return {
    success: true,
    data: {
      file,
      go: go ?? { ...GO_VERSIONS.DEFAULT },
      use: uses.map(use => use.path),
      manifests,
      replace
    }
  };
}

/**
 * Map a `use` path to the manifest it names, relative to the workspace
 * file's directory. Parent-directory segments and absolute paths are
 * rejected; a leading `./` and a trailing `/` are dropped.
 */
export function resolveUseDirective(usePath: string, workspaceFile: string, lineNo: number): Outcome<string, ParseError> {
  if (usePath.split('/').includes('..')) {
    return {
      success: false,
      error: new ParseError(workspaceFile, lineNo, `use directive '${usePath}' contains '..', which is not supported`)
    };
  }
  if (usePath.startsWith('/')) {
    return {
      success: false,
      error: new ParseError(workspaceFile, lineNo, `use directive '${usePath}' is an absolute path, which is not supported`)
    };
  }

  let relative = usePath;
  if (relative.startsWith('./')) {
    relative = relative.slice(2);
  } else if (relative === '.') {
    relative = '';
  }
  if (relative.endsWith('/')) {
    relative = relative.slice(0, -1);
  }

  return { success: true, data: join(dirname(workspaceFile), relative, FILE_PATTERNS.MANIFEST) };
}
