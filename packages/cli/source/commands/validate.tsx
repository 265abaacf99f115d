import { Box, Text } from "ink";
import { useEffect, useState } from "react";
import zod from "zod";
import {
	type ValidateSummary,
	errorMessage,
	runValidate,
} from "../utils/taxon-io.js";
import { loggingOptions } from "../utils/logging-flags.js";

export const description = "Check that every taxon id of a list is in the index";

export const options = zod.object({
	infile: zod.string().describe("Snapshot written by the build command"),
	taxidvalidate: zod.string().describe("File of taxon ids to check"),
	taxidfilter: zod
		.string()
		.optional()
		.describe("File of taxon ids accepted as valid even when not in the index"),
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

const LISTED = 20;

export default function Validate({ options }: Props) {
	const [result, setResult] = useState<ValidateSummary | null>(null);
	const [loading, setLoading] = useState(true);
	const [error, setError] = useState<string | null>(null);

	useEffect(() => {
		async function validate() {
			try {
				setResult(await runValidate(options));
			} catch (err) {
				setError(errorMessage(err, "Validation failed"));
			} finally {
				setLoading(false);
			}
		}
		void validate();
	}, [options]);

	// Invalid lists exit non-zero so scripts can branch on the outcome
	useEffect(() => {
		if (!loading) {
			setTimeout(() => {
				process.exit(error || !result?.valid ? 1 : 0);
			}, 100);
		}
	}, [loading, error, result]);

	if (loading) return <Text>Validating {options.taxidvalidate}...</Text>;
	if (error) return <Text color="red">Error: {error}</Text>;
	if (!result) return <Text color="red">No validation result available</Text>;

	if (result.valid) {
		return <Text color="green">✅ All taxon ids are in the index</Text>;
	}

	return (
		<Box flexDirection="column">
			<Text color="red">
				❌ {result.unknown.length} taxon id(s) not found in the index:
			</Text>
			{result.unknown.slice(0, LISTED).map((id) => (
				<Box key={id} marginLeft={2}>
					<Text color="red">• {id}</Text>
				</Box>
			))}
			{result.unknown.length > LISTED && (
				<Box marginLeft={2}>
					<Text color="gray">… and {result.unknown.length - LISTED} more</Text>
				</Box>
			)}
		</Box>
	);
}
