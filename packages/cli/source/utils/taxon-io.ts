import { writeFile } from "node:fs/promises";
import {
	type BuildReport,
	createModuleLogger,
	extractErrorDetails,
	type DuplicatePolicy,
	type IdListFile,
	type IndexVariant,
	type SnapshotFormat,
	type TaxonId,
	TaxonResolver,
} from "@taxindex/core";

/**
 * Command bodies, kept free of Ink so they can run (and be tested) on their own
 */

const log = createModuleLogger("cli");

export interface IdListFlags {
	sep?: string | undefined;
	indx: number;
}

export function idListFile(path: string, flags: IdListFlags): IdListFile {
	return flags.sep === undefined
		? { path, field: flags.indx }
		: { path, separator: flags.sep, field: flags.indx };
}

export function formatIdList(ids: Iterable<TaxonId>): string {
	const lines = [...ids];
	return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

export async function writeIdList(
	path: string,
	ids: Iterable<TaxonId>,
): Promise<void> {
	await writeFile(path, formatIdList(ids), "utf8");
}

/**
 * The line shown to the user; the full details go to the debug log
 */
export function errorMessage(err: unknown, fallback: string): string {
	const details = extractErrorDetails(err);
	log.debug(details, "Command failed");
	return details.message === "" ? fallback : details.message;
}

export interface BuildFlags extends IdListFlags {
	infile: string;
	outfile: string;
	informat?: SnapshotFormat | undefined;
	outformat: SnapshotFormat;
	variant?: IndexVariant | undefined;
	duplicates: DuplicatePolicy;
	taxidfilter?: string | undefined;
}

export interface BuildSummary {
	outfile: string;
	variant: IndexVariant;
	nodes: number;
	filtered: boolean;
	report: BuildReport;
}

/**
 * Build an index from a dump (or re-encode a snapshot when `informat` is
 * given), optionally filter it, and write the snapshot. A re-encoded
 * snapshot keeps its variant unless one is asked for.
 */
export async function runBuild(flags: BuildFlags): Promise<BuildSummary> {
	const source =
		flags.informat === undefined
			? await TaxonResolver.build(flags.infile, {
					variant: flags.variant,
					duplicatePolicy: flags.duplicates,
				})
			: await TaxonResolver.load(flags.infile, flags.informat, flags.variant);

	const resolver =
		flags.taxidfilter === undefined
			? source
			: source.filter(idListFile(flags.taxidfilter, flags));

	await resolver.write(flags.outfile, flags.outformat);

	return {
		outfile: flags.outfile,
		variant: resolver.index.kind,
		nodes: resolver.index.size,
		filtered: flags.taxidfilter !== undefined,
		// anomalies come from the dump, not from the filtered copy
		report: source.report,
	};
}

export interface SearchFlags extends IdListFlags {
	infile: string;
	outfile: string;
	taxidsearch: string;
	taxidexclude?: string | undefined;
	taxidfilter?: string | undefined;
	ignoreinvalid: boolean;
}

export interface SearchSummary {
	outfile: string;
	count: number;
}

export async function runSearch(flags: SearchFlags): Promise<SearchSummary> {
	const resolver = await TaxonResolver.load(flags.infile);
	const ids = resolver.search({
		include: idListFile(flags.taxidsearch, flags),
		exclude:
			flags.taxidexclude === undefined
				? undefined
				: idListFile(flags.taxidexclude, flags),
		filter:
			flags.taxidfilter === undefined
				? undefined
				: idListFile(flags.taxidfilter, flags),
		ignoreInvalid: flags.ignoreinvalid,
	});

	await writeIdList(flags.outfile, ids);
	return { outfile: flags.outfile, count: ids.size };
}

export interface ValidateFlags extends IdListFlags {
	infile: string;
	taxidvalidate: string;
	taxidfilter?: string | undefined;
}

export interface ValidateSummary {
	valid: boolean;
	unknown: TaxonId[];
}

export async function runValidate(
	flags: ValidateFlags,
): Promise<ValidateSummary> {
	const resolver = await TaxonResolver.load(flags.infile);
	const unknown = resolver.findUnknown(idListFile(flags.taxidvalidate, flags), {
		accept:
			flags.taxidfilter === undefined
				? undefined
				: idListFile(flags.taxidfilter, flags),
	});
	return { valid: unknown.length === 0, unknown };
}
