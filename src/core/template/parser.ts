/**
 * Parser for the indentation-based WAF check template.
 *
 * The template is not YAML; only lines of the form `key: mandatory|optional`
 * are recognised:
 *
 *   title: mandatory
 *   environments: mandatory
 *     - name: mandatory
 *       region: optional
 *
 * A key at column 0 is a top-level rule. Indented lines (and `- ` list items)
 * add nested rules under the most recent top-level key. Anything else is
 * ignored.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { fileExistsSync, readFileSync } from '../../utils/file-system.js';
import type { RequirementStatus, TemplateRules } from './types.js';

const STATUS_PATTERN = /^([A-Za-z0-9_]+)\s*:\s*(mandatory|optional)\s*$/i;
const LIST_MARKER = '- ';

interface StatusLine {
  key: string;
  status: RequirementStatus;
}

function matchStatusLine(text: string): StatusLine | null {
  const match = STATUS_PATTERN.exec(text);
  if (!match) return null;
  const status = match[2].toLowerCase() === 'mandatory' ? 'mandatory' : 'optional';
  return { key: match[1], status };
}

/**
 * Parent tracking across lines: the last top-level key, and the parent that
 * list items have attached to since then.
 */
class ParentTracker {
  private topLevelParent: string | null = null;
  private listParent: string | null = null;

  enterTopLevel(key: string): void {
    this.topLevelParent = key;
    this.listParent = null;
  }

  /** Parent for an indented or list line, or null when none is active. */
  activeParent(): string | null {
    return this.listParent ?? this.topLevelParent;
  }

  enterListItem(parent: string): void {
    this.listParent = parent;
  }
}

/**
 * Parse template text into top-level and nested rule tables.
 * Malformed lines are skipped, never fatal.
 */
export function parseTemplate(content: string): TemplateRules {
  const topLevel = new Map<string, RequirementStatus>();
  const nested = new Map<string, Map<string, RequirementStatus>>();
  const tracker = new ParentTracker();

  const addNested = (parent: string, line: StatusLine): void => {
    let children = nested.get(parent);
    if (!children) {
      children = new Map();
      nested.set(parent, children);
    }
    children.set(line.key, line.status);
  };

  for (const rawLine of content.split(/\r?\n/)) {
    const stripped = rawLine.trim();
    if (!stripped) continue;

    const indent = rawLine.length - rawLine.trimStart().length;
    const statusLine = matchStatusLine(stripped);

    if (indent === 0 && statusLine) {
      topLevel.set(statusLine.key, statusLine.status);
      tracker.enterTopLevel(statusLine.key);
      continue;
    }

    const parent = tracker.activeParent();
    if (parent === null) continue;

    if (stripped.startsWith(LIST_MARKER)) {
      const inner = matchStatusLine(stripped.slice(LIST_MARKER.length).trim());
      if (inner) {
        addNested(parent, inner);
        tracker.enterListItem(parent);
      }
      continue;
    }

    if (statusLine) {
      addNested(parent, statusLine);
    }
  }

  return { topLevel, nested };
}

/**
 * Read and parse a template file.
 */
export function loadTemplate(templatePath: string): TemplateRules {
  if (!fileExistsSync(templatePath)) {
    throw new ConfigError(
      ErrorCodes.TEMPLATE_NOT_FOUND,
      `Template not found: ${templatePath}`,
      { path: templatePath }
    );
  }
  return parseTemplate(readFileSync(templatePath));
}
