/**
 * Symbol mapper: translates instrument ids between the master and slave
 * catalogs.
 *
 * Brokers number their symbols independently, so ids are matched through the
 * symbol name: source id → name → alias → target name → target id. Names are
 * compared trimmed and upper-cased. Lookups are synchronous and pure once the
 * catalogs are loaded; the session coordinator reloads both on every
 * (re)connect.
 */

import { NotFoundError } from "../shared/errors.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { Broker, type InstrumentSpec, type SymbolCatalog } from "./types.js";

interface IndexedCatalog {
	readonly catalog: SymbolCatalog;
	readonly byId: ReadonlyMap<number, InstrumentSpec>;
	readonly byName: ReadonlyMap<string, InstrumentSpec>;
}

export function normalizeSymbolName(name: string): string {
	return name.trim().toUpperCase();
}

function indexCatalog(catalog: SymbolCatalog): IndexedCatalog {
	const byId = new Map<number, InstrumentSpec>();
	const byName = new Map<string, InstrumentSpec>();
	for (const spec of catalog.instruments) {
		byId.set(spec.id, spec);
		byName.set(normalizeSymbolName(spec.name), spec);
	}
	return { catalog, byId, byName };
}

export class SymbolMapper {
	/** master name → slave name */
	private readonly forward: ReadonlyMap<string, string>;
	/** slave name → master name */
	private readonly reverse: ReadonlyMap<string, string>;
	private readonly catalogs = new Map<Broker, IndexedCatalog>();

	/** @param aliases - master symbol name → slave symbol name, for names that differ */
	constructor(aliases: ReadonlyMap<string, string> = new Map()) {
		const forward = new Map<string, string>();
		const reverse = new Map<string, string>();
		for (const [master, slave] of aliases) {
			forward.set(normalizeSymbolName(master), normalizeSymbolName(slave));
			reverse.set(normalizeSymbolName(slave), normalizeSymbolName(master));
		}
		this.forward = forward;
		this.reverse = reverse;
	}

	/** Replace one side's catalog. */
	loadCatalog(catalog: SymbolCatalog): void {
		this.catalogs.set(catalog.broker, indexCatalog(catalog));
	}

	/** Both catalogs are loaded. */
	get isReady(): boolean {
		return this.catalogs.has(Broker.Master) && this.catalogs.has(Broker.Slave);
	}

	catalog(broker: Broker): SymbolCatalog | undefined {
		return this.catalogs.get(broker)?.catalog;
	}

	spec(broker: Broker, id: InstrumentId): InstrumentSpec | undefined {
		return this.catalogs.get(broker)?.byId.get(id);
	}

	findByName(broker: Broker, name: string): InstrumentSpec | undefined {
		return this.catalogs.get(broker)?.byName.get(normalizeSymbolName(name));
	}

	/** Map an instrument id from one catalog to the other. */
	resolve(id: InstrumentId, source: Broker, target: Broker): Result<InstrumentId, NotFoundError> {
		const spec = this.resolveSpec(id, source, target);
		return spec.ok ? ok(spec.value.id) : spec;
	}

	/** Like resolve(), but returns the whole target spec. */
	resolveSpec(
		id: InstrumentId,
		source: Broker,
		target: Broker,
	): Result<InstrumentSpec, NotFoundError> {
		const from = this.spec(source, id);
		if (!from) {
			return err(
				new NotFoundError(`Instrument ${id} is not in the ${source} catalog`, {
					instrumentId: id,
					broker: source,
				}),
			);
		}
		if (source === target) return ok(from);

		const name = normalizeSymbolName(from.name);
		const aliases = source === Broker.Master ? this.forward : this.reverse;
		const targetName = aliases.get(name) ?? name;
		const to = this.findByName(target, targetName);
		if (!to) {
			return err(
				new NotFoundError(`Symbol ${targetName} is not in the ${target} catalog`, {
					instrumentId: id,
					symbol: targetName,
					broker: target,
				}),
			);
		}
		return ok(to);
	}
}
