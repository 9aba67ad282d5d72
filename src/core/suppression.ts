import type { IToken } from 'chevrotain';
import type { SourceFile } from './source.js';
import type { TextRange } from './types.js';

export const DIRECTIVE_PREFIX = 'classfinal';

export type RuleState = 'enabled' | 'disabled' | 'unresolvable';

export interface SuppressionFilter {
  check(range: TextRange, ruleId: string): RuleState;
}

export type CommandAction = 'enable' | 'disable';
export type CommandScope = 'next' | 'this' | 'previous';

export interface Command {
  action: CommandAction;
  scope?: CommandScope;
  ruleIds: string[];
  offset: number;
  line: number;
}

const COMMAND_RE = new RegExp(`${DIRECTIVE_PREFIX}:(enable|disable)(?::(next|this|previous))?(?=\\s|$)(.*)`);
const RULE_ID_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parses `classfinal:disable[:next|:this|:previous] <rule>...` from comment text.
 * Rule ids end at the first word that is not an identifier, so a trailing
 * ` - reason` is allowed.
 */
export function parseCommand(comment: string, offset: number, line: number): Command | undefined {
  const m = COMMAND_RE.exec(comment);
  if (!m) return undefined;
  const action: CommandAction = m[1] === 'enable' ? 'enable' : 'disable';
  const scopeText = m[2];
  const scope: CommandScope | undefined = scopeText === 'next' || scopeText === 'this' || scopeText === 'previous' ? scopeText : undefined;
  const ruleIds: string[] = [];
  for (const word of (m[3] ?? '').replace(/\*\/\s*$/, '').split(/[\s,]+/).filter(Boolean)) {
    if (!RULE_ID_RE.test(word)) break;
    ruleIds.push(word);
  }
  if (ruleIds.length === 0) return undefined;
  return { action, ...(scope ? { scope } : {}), ruleIds, offset, line };
}

function targetLine(command: Command): number {
  switch (command.scope) {
    case 'next': return command.line + 1;
    case 'previous': return command.line - 1;
    default: return command.line;
  }
}

function names(command: Command, ruleId: string): boolean {
  return command.ruleIds.includes(ruleId) || command.ruleIds.includes('all');
}

export class CommandSuppressionFilter implements SuppressionFilter {
  private readonly regionCommands: Command[];
  private readonly lineCommands: Command[];

  constructor(private readonly file: SourceFile, readonly commands: Command[]) {
    const ordered = [...commands].sort((a, b) => a.offset - b.offset);
    this.regionCommands = ordered.filter((c) => c.scope === undefined);
    this.lineCommands = ordered.filter((c) => c.scope !== undefined);
  }

  static fromComments(file: SourceFile, comments: IToken[]): CommandSuppressionFilter {
    const commands: Command[] = [];
    for (const tok of comments) {
      const location = file.location(tok.startOffset);
      if (!location) continue;
      const command = parseCommand(tok.image, tok.startOffset, location.line);
      if (command) commands.push(command);
    }
    return new CommandSuppressionFilter(file, commands);
  }

  check(range: TextRange, ruleId: string): RuleState {
    const location = this.file.location(range.location);
    if (!location || !this.file.range(range.location, range.location + range.length)) return 'unresolvable';
    let enabled = true;
    // A region command takes effect from where the comment starts.
    for (const c of this.regionCommands) {
      if (c.offset > range.location) break;
      if (names(c, ruleId)) enabled = c.action === 'enable';
    }
    for (const c of this.lineCommands) {
      if (targetLine(c) === location.line && names(c, ruleId)) enabled = c.action === 'enable';
    }
    return enabled ? 'enabled' : 'disabled';
  }
}

export const noSuppression: SuppressionFilter = {
  check: () => 'enabled',
};
