import { Box, Text } from "ink";
import { useEffect, useState } from "react";
import zod from "zod";
import {
	type BuildSummary,
	errorMessage,
	runBuild,
} from "../utils/taxon-io.js";
import { loggingOptions } from "../utils/logging-flags.js";

export const description =
	"Build an index from an NCBI nodes.dmp file (or re-encode a snapshot) and write it as a snapshot";

export const options = zod.object({
	infile: zod
		.string()
		.describe("Input nodes.dmp file, or a snapshot when --informat is given"),
	outfile: zod.string().describe("Snapshot file to write"),
	informat: zod
		.enum(["msgpack", "json"])
		.optional()
		.describe("Read the input as a snapshot in this format"),
	outformat: zod
		.enum(["msgpack", "json"])
		.default("msgpack")
		.describe("Snapshot encoding to write"),
	variant: zod
		.enum(["adjacency", "interval"])
		.optional()
		.describe(
			"Index implementation stored in the snapshot (a dump builds the configured default, a snapshot keeps its own)",
		),
	duplicates: zod
		.enum(["reject", "override"])
		.default("reject")
		.describe(
			"Conflicting redeclarations of an id: fail the build, or keep the last record",
		),
	taxidfilter: zod
		.string()
		.optional()
		.describe(
			"File of taxon ids; only their lineages and subtrees are kept in the output",
		),
	sep: zod
		.string()
		.optional()
		.describe("Field separator of the filter list file"),
	indx: zod
		.number()
		.int()
		.min(0)
		.default(0)
		.describe("Zero-based field holding the taxon id when --sep is given"),
	...loggingOptions,
});

type Props = {
	options: zod.infer<typeof options>;
};

export default function Build({ options }: Props) {
	const [summary, setSummary] = useState<BuildSummary | null>(null);
	const [loading, setLoading] = useState(true);
	const [error, setError] = useState<string | null>(null);

	useEffect(() => {
		async function build() {
			try {
				setSummary(await runBuild(options));
			} catch (err) {
				setError(errorMessage(err, "Failed to build the index"));
			} finally {
				setLoading(false);
			}
		}
		void build();
	}, [options]);

	// Exit once the outcome is rendered
	useEffect(() => {
		if (!loading) {
			setTimeout(() => {
				process.exit(error ? 1 : 0);
			}, 100);
		}
	}, [loading, error]);

	if (loading) return <Text>Building index from {options.infile}...</Text>;
	if (error) return <Text color="red">Error: {error}</Text>;
	if (!summary) return <Text color="red">No build result available</Text>;

	const { report } = summary;

	return (
		<Box flexDirection="column">
			<Text color="green">
				✅ Wrote {summary.variant} index with {summary.nodes} nodes to{" "}
				{summary.outfile}
				{summary.filtered ? " (filtered)" : ""}
			</Text>

			{report.malformed.length > 0 && (
				<Text color="yellow">
					⚠️ Skipped {report.malformed.length} malformed line(s), first at
					line {report.malformed[0]?.lineNumber}
				</Text>
			)}
			{report.orphans.length > 0 && (
				<Text color="yellow">
					⚠️ {report.orphans.length} orphan node(s) left out of the tree (
					{report.unreachable} unreachable in total)
				</Text>
			)}
			{report.duplicates.length > 0 && (
				<Text color="yellow">
					⚠️ Overrode {report.duplicates.length} conflicting redeclaration(s)
				</Text>
			)}
			{report.unrecognizedRanks.length > 0 && (
				<Text color="yellow">
					⚠️ Unrecognized rank(s): {report.unrecognizedRanks.join(", ")}
				</Text>
			)}
		</Box>
	);
}
