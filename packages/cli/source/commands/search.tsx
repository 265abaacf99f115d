import { Text } from "ink";
import { useEffect, useState } from "react";
import zod from "zod";
import {
	type SearchSummary,
	errorMessage,
	runSearch,
} from "../utils/taxon-io.js";
import { loggingOptions } from "../utils/logging-flags.js";

export const description =
	"Write the ids under the searched taxa, minus excluded subtrees, optionally intersected with a filter list";

export const options = zod.object({
	infile: zod.string().describe("Snapshot written by the build command"),
	outfile: zod.string().describe("File receiving the result, one id per line"),
	taxidsearch: zod
		.string()
		.describe("File of taxon ids whose subtrees make up the result"),
	taxidexclude: zod
		.string()
		.optional()
		.describe("File of taxon ids whose subtrees are removed from the result"),
	taxidfilter: zod
		.string()
		.optional()
		.describe("File of literal taxon ids the result is intersected with"),
	ignoreinvalid: zod
		.boolean()
		.default(false)
		.describe("Skip ids missing from the index instead of failing"),
	sep: zod
		.string()
		.optional()
		.describe("Field separator of the id list files"),
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

export default function Search({ options }: Props) {
	const [summary, setSummary] = useState<SearchSummary | null>(null);
	const [loading, setLoading] = useState(true);
	const [error, setError] = useState<string | null>(null);

	useEffect(() => {
		async function search() {
			try {
				setSummary(await runSearch(options));
			} catch (err) {
				setError(errorMessage(err, "Search failed"));
			} finally {
				setLoading(false);
			}
		}
		void search();
	}, [options]);

	useEffect(() => {
		if (!loading) {
			setTimeout(() => {
				process.exit(error ? 1 : 0);
			}, 100);
		}
	}, [loading, error]);

	if (loading) return <Text>Searching {options.infile}...</Text>;
	if (error) return <Text color="red">Error: {error}</Text>;
	if (!summary) return <Text color="red">No search result available</Text>;

	return (
		<Text color="green">
			✅ Wrote {summary.count} taxon id(s) to {summary.outfile}
		</Text>
	);
}
