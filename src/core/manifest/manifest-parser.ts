/**
 * Manifest (go.mod) parser.
 *
 * Recognizes single-line directives and parenthesized blocks. Inside a
 * block every line is parsed with the enclosing directive's entry rule.
 * Parsing is a pure function of the text; the file path is only used in
 * diagnostics and to anchor local replace directories.
 */

import { GO_VERSIONS, GRAMMAR, MANIFEST_DIRECTIVES } from '../../constants/index.js';
import type {
  ExcludeDirective,
  GoVersion,
  Outcome,
  ParsedManifest,
  ReplaceMap,
  RequireDirective
} from '../../types/index.js';
import { ParseError } from '../../utils/errors.js';
import { canonicalizeRawVersion, parseVersion } from '../../utils/version.js';
import { parseGoDirective, parseReplaceDirective, recordReplace } from './directives.js';
import { normalizeWhitespace, tokenizeLine } from './tokenizer.js';

type ManifestDirective = (typeof MANIFEST_DIRECTIVES)[number];

interface ManifestState {
  module?: string;
  go?: GoVersion;
  toolchain?: string;
  require: RequireDirective[];
  exclude: ExcludeDirective[];
  retract: string[];
  replace: ReplaceMap;
}

function isManifestDirective(token: string): token is ManifestDirective {
  return MANIFEST_DIRECTIVES.some(directive => directive === token);
}

export function parseManifest(content: string, file: string): Outcome<ParsedManifest, ParseError> {
  const state: ManifestState = {
    require: [],
    exclude: [],
    retract: [],
    replace: new Map()
  };

  let currentDirective: ManifestDirective | null = null;
  let blockLine = 0;
  const lines = normalizeWhitespace(content).split('\n');

  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const tokenized = tokenizeLine(lines[index], file, lineNo);
    if (!tokenized.success) {
      return tokenized;
    }
    const { tokens, comment } = tokenized.data;
    if (tokens.length === 0) {
      continue;
    }

    if (currentDirective) {
      if (tokens[0] === GRAMMAR.BLOCK_CLOSE) {
        if (tokens.length > 1) {
          return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[1]}' after ')'`) };
        }
        currentDirective = null;
        continue;
      }
      const applied = applyDirective(state, currentDirective, tokens, comment, file, lineNo);
      if (!applied.success) {
        return applied;
      }
      continue;
    }

    const keyword = tokens[0];
    if (!isManifestDirective(keyword)) {
      return { success: false, error: new ParseError(file, lineNo, `unexpected token '${keyword}' at start of line`) };
    }
    if (tokens.length === 1) {
      return { success: false, error: new ParseError(file, lineNo, `expected another token after '${keyword}'`) };
    }

    if (keyword === 'go' || keyword === 'toolchain') {
      if (tokens[1] === GRAMMAR.BLOCK_OPEN) {
        return { success: false, error: new ParseError(file, lineNo, `'${keyword}' directive has no block form`) };
      }
    } else if (tokens[1] === GRAMMAR.BLOCK_OPEN) {
      if (tokens.length > 2) {
        return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[2]}' after '('`) };
      }
      currentDirective = keyword;
      blockLine = lineNo;
      continue;
    }

    if (keyword === 'go') {
      const go = parseGoDirective(tokens, state.go, file, lineNo);
      if (!go.success) {
        return go;
      }
      state.go = go.data;
      continue;
    }

    const applied = applyDirective(state, keyword, tokens.slice(1), comment, file, lineNo);
    if (!applied.success) {
      return applied;
    }
  }

  if (currentDirective) {
    return { success: false, error: new ParseError(file, blockLine, `unclosed '${currentDirective}' block`) };
  }
  if (!state.module) {
    return { success: false, error: new ParseError(file, undefined, 'expected a module directive') };
  }

  return {
    success: true,
    data: {
      file,
      module: state.module,
      // Without a go directive, 1.16 is assumed
      go: state.go ?? { ...GO_VERSIONS.DEFAULT },
      toolchain: state.toolchain,
      require: state.require,
      exclude: state.exclude,
      retract: state.retract,
      replace: state.replace
    }
  };
}

/**
 * Apply one directive entry; `tokens` excludes the directive keyword.
 */
function applyDirective(
  state: ManifestState,
  directive: ManifestDirective,
  tokens: string[],
  comment: string | null,
  file: string,
  lineNo: number
): Outcome<void, ParseError> {
  switch (directive) {
    case 'module': {
      if (state.module !== undefined) {
        return { success: false, error: new ParseError(file, lineNo, "unexpected second 'module' directive") };
      }
      if (tokens.length > 1) {
        return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[1]}' after '${tokens[0]}'`) };
      }
      state.module = tokens[0];
      return { success: true, data: undefined };
    }

    case 'require': {
      if (tokens.length !== 2) {
        return { success: false, error: new ParseError(file, lineNo, "expected module path and version in 'require' directive") };
      }
      const rawVersion = canonicalizeRawVersion(tokens[1]);
      const version = parseVersion(rawVersion);
      if (!version) {
        return { success: false, error: new ParseError(file, lineNo, `invalid version '${tokens[1]}' for '${tokens[0]}'`) };
      }
      state.require.push({
        path: tokens[0],
        version,
        rawVersion,
        indirect: comment === GRAMMAR.INDIRECT_COMMENT,
        line: lineNo
      });
      return { success: true, data: undefined };
    }

    case 'exclude': {
      if (tokens.length !== 2) {
        return { success: false, error: new ParseError(file, lineNo, "expected module path and version in 'exclude' directive") };
      }
      state.exclude.push({ path: tokens[0], rawVersion: canonicalizeRawVersion(tokens[1]), line: lineNo });
      return { success: true, data: undefined };
    }

    case 'retract': {
      state.retract.push(tokens.join(' '));
      return { success: true, data: undefined };
    }

    case 'replace': {
      const replace = parseReplaceDirective(tokens, file, lineNo);
      if (!replace.success) {
        return replace;
      }
      recordReplace(state.replace, replace.data);
      return { success: true, data: undefined };
    }

    case 'toolchain': {
      if (tokens.length > 1) {
        return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[1]}' after '${tokens[0]}'`) };
      }
      state.toolchain = tokens[0];
      return { success: true, data: undefined };
    }

    case 'go':
      // Only reachable from a block, which the caller never opens for 'go'
      return { success: false, error: new ParseError(file, lineNo, "'go' directive has no block form") };
  }
}
