import { or } from "@clausal/logic";
import type { Term } from "@clausal/logic";
import {
  compileProgram,
  evaluateClause,
  freshEnvironment,
} from "./compiler/index.js";
import type { Clause, Relation } from "./compiler/index.js";
import { createUndefinedRelationError } from "./errors.js";
import { Query } from "./query.js";
import type { QueryHost, Solution } from "./query.js";
import { ConfigurationManager } from "./shared/config.js";
import { Logger } from "./shared/logger.js";
import type { ClausalConfig, ConfigOverrides } from "./shared/types.js";

export interface ProgramOptions {
  config?: ConfigOverrides;
  /** Overrides the logger built from `config.logging`. */
  logger?: Logger;
}

/**
 * An immutable database of relations, one per predicate symbol.
 *
 * Each relation tries its clauses in declaration order and yields the
 * solutions of all of them. Every clause activation gets its own fresh
 * variables, so sibling clauses and separate calls never share bindings.
 */
export class Program implements QueryHost {
  readonly config: ClausalConfig;
  readonly logger: Logger;
  private readonly relations: ReadonlyMap<string, Relation>;
  private readonly clauses: ReadonlyMap<string, readonly Clause[]>;

  private constructor(clauses: readonly Clause[], options: ProgramOptions) {
    this.config = ConfigurationManager.create(options.config);
    this.logger = options.logger ?? new Logger(this.config.logging);

    // Map preserves first-insertion order, so symbols stay in the order
    // they were first declared.
    const grouped = new Map<string, Clause[]>();
    for (const clause of clauses) {
      const group = grouped.get(clause.symbol);
      if (group) {
        group.push(clause);
      } else {
        grouped.set(clause.symbol, [clause]);
      }
    }

    const relations = new Map<string, Relation>();
    for (const [symbol, group] of grouped) {
      relations.set(symbol, this.makeRelation(symbol, group));
      this.logger.log("RELATION_BUILT", () => ({
        symbol,
        clauses: group.length,
        kinds: group.map((clause) => clause.kind),
      }));
    }

    this.clauses = grouped;
    this.relations = relations;
    this.logger.log("PROGRAM_LOADED", () => ({ symbols: [...grouped.keys()] }));
  }

  /**
   * Parses and compiles `text` into a program. Throws `ClausalSyntaxError`
   * on malformed input.
   */
  static fromSource(text: string, options: ProgramOptions = {}): Program {
    return new Program(compileProgram(text), options);
  }

  static fromClauses(
    clauses: readonly Clause[],
    options: ProgramOptions = {},
  ): Program {
    return new Program(clauses, options);
  }

  private makeRelation(symbol: string, clauses: readonly Clause[]): Relation {
    return (...args: Term[]) => {
      this.logger.log("RELATION_CALLED", () => ({ symbol, arity: args.length }));
      return or(
        ...clauses.map((clause) =>
          evaluateClause(clause, this, args, freshEnvironment(clause.freeVars)),
        ),
      );
    };
  }

  /**
   * Looks up a relation by predicate symbol.
   * Throws `UndefinedRelationError` when the program has no such predicate.
   */
  relation(symbol: string): Relation {
    const relation = this.relations.get(symbol);
    if (relation === undefined) {
      throw createUndefinedRelationError(symbol);
    }
    return relation;
  }

  has(symbol: string): boolean {
    return this.relations.has(symbol);
  }

  /** Predicate symbols in order of first declaration. */
  symbols(): string[] {
    return [...this.relations.keys()];
  }

  clauseCount(symbol: string): number {
    return this.clauses.get(symbol)?.length ?? 0;
  }

  /**
   * Starts a fluent query: `program.query("Member x [1, 2]").limit(1)`.
   */
  query(text: string): Query {
    return new Query(this, text);
  }

  /**
   * Lazily yields one solution per answer, reporting `vars` (default: every
   * variable in the query) and stopping after `limit` answers.
   */
  ask(
    text: string,
    vars?: string | readonly string[],
    limit?: number,
  ): Iterable<Solution> {
    return this.query(text).select(vars).limit(limit);
  }

  /**
   * Like `ask`, but each solution rendered as one line.
   */
  q(text: string, vars?: string | readonly string[], limit?: number): string[] {
    return this.query(text).select(vars).limit(limit).format();
  }
}
