import { NO_RESULT, emptySubst, reify, run } from "@clausal/logic";
import type { Term } from "@clausal/logic";
import { SimpleObservable } from "@clausal/observable";
import { compileQueryText, freshEnvironment } from "./compiler/index.js";
import type { CompiledQuery, Database } from "./compiler/index.js";
import { formatSolution } from "./printer.js";
import type { Logger } from "./shared/logger.js";
import type { ClausalConfig } from "./shared/types.js";

/**
 * The shape of a single result from a query: requested name to its reified value.
 */
export type Solution = Record<string, Term>;

/**
 * What a query runs against. `Program` is the implementation.
 */
export interface QueryHost extends Database {
	readonly config: ClausalConfig;
	readonly logger: Logger;
}

/**
 * A fluent interface over one parsed query. Solutions are computed lazily on
 * iteration; each iteration is an independent run with its own variables.
 */
export class Query implements Iterable<Solution> {
	private readonly _compiled: CompiledQuery;
	private _selected: readonly string[] | null = null;
	private _limit: number;

	/**
	 * Parses `text` and checks that every predicate it calls directly exists.
	 * Throws `ClausalSyntaxError` or `UndefinedRelationError`.
	 */
	constructor(
		private readonly host: QueryHost,
		readonly text: string,
	) {
		this._compiled = compileQueryText(text);
		for (const symbol of this._compiled.calls) {
			host.relation(symbol);
		}
		this._limit = host.config.query.defaultLimit;
	}

	/**
	 * Names to report, as an array or a whitespace-separated string.
	 * Without an argument, every variable the query mentions is reported.
	 */
	select(names?: string | readonly string[]): this {
		if (names === undefined) {
			this._selected = null;
		} else if (typeof names === "string") {
			this._selected = names.split(/\s+/).filter((name) => name.length > 0);
		} else {
			this._selected = [...names];
		}
		return this;
	}

	/**
	 * Sets the maximum number of results. Without an argument the configured
	 * default applies.
	 */
	limit(n?: number): this {
		if (n === undefined) {
			this._limit = this.host.config.query.defaultLimit;
			return this;
		}
		if (!(n >= 0)) {
			throw new RangeError(`limit must be a non-negative number, got ${n}`);
		}
		this._limit = n;
		return this;
	}

	/**
	 * The names each solution will carry, in report order.
	 */
	get variables(): string[] {
		return this._selected !== null
			? [...this._selected]
			: [...this._compiled.freeVars].sort();
	}

	*[Symbol.iterator](): Generator<Solution, void, undefined> {
		const { logger } = this.host;
		const names = this.variables;
		const limit = this._limit;
		// Requested names the query never mentions get variables of their own.
		const env = freshEnvironment(new Set([...this._compiled.freeVars, ...names]));
		const goal = this._compiled.evaluate(this.host, [], env);

		logger.log("QUERY_STARTED", () => ({ query: this.text, names, limit }));
		if (limit <= 0) return;

		let count = 0;
		for (const item of run(goal, emptySubst)) {
			if (item === NO_RESULT) continue;

			const solution: Solution = {};
			for (const name of names) {
				const v = env.get(name);
				if (v !== undefined) solution[name] = reify(v, item);
			}
			count++;
			logger.log("QUERY_SOLUTION", () => formatSolution(solution));
			yield solution;

			if (count >= limit) {
				logger.log("QUERY_LIMIT_REACHED", () => ({ query: this.text, limit }));
				return;
			}
		}
		logger.log("QUERY_EXHAUSTED", () => ({ query: this.text, count }));
	}

	/**
	 * Executes the query and returns all results as an array. Never returns
	 * for an unbounded search without a limit.
	 */
	toArray(): Solution[] {
		return [...this];
	}

	first(): Solution | undefined {
		for (const solution of this) {
			return solution;
		}
		return undefined;
	}

	/**
	 * Returns the solutions as an observable. Each subscription runs the search
	 * afresh, pulling one solution per emission; unsubscribing or `take(n)`
	 * stops the search.
	 */
	toObservable(): SimpleObservable<Solution> {
		return SimpleObservable.fromLazy(this);
	}

	/**
	 * Each solution as one printable line, e.g. `a: _.0; x: _.0`.
	 */
	format(): string[] {
		return this.toArray().map(formatSolution);
	}
}
