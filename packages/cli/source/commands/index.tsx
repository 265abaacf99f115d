import { Box, Text } from "ink";
import { description as buildDescription } from "./build.js";
import { description as searchDescription } from "./search.js";
import { description as validateDescription } from "./validate.js";

export const description = "Show help and usage information";

export const commands = [
	{ name: "build", description: buildDescription },
	{ name: "search", description: searchDescription },
	{ name: "validate", description: validateDescription },
] as const;

export default function Help() {
	return (
		<Box flexDirection="column" gap={1}>
			<Text bold color="cyan">
				🌳 taxindex
			</Text>
			<Text color="gray">
				Hierarchical index and subtree queries over the NCBI Taxonomy
			</Text>

			<Text bold>Available Commands:</Text>
			<Box flexDirection="column" paddingLeft={2}>
				{commands.map((cmd) => (
					<Text key={cmd.name}>
						<Text color="cyan">{cmd.name}</Text> - {cmd.description}
					</Text>
				))}
			</Box>

			<Text bold>Examples:</Text>
			<Box flexDirection="column" paddingLeft={2}>
				<Text>
					<Text color="cyan">
						taxindex build --infile nodes.dmp --outfile tree.msgpack
					</Text>{" "}
					- Index a taxonomy dump
				</Text>
				<Text>
					<Text color="cyan">
						taxindex search --infile tree.msgpack --outfile out.txt
						--taxidsearch include.txt --taxidexclude exclude.txt
					</Text>{" "}
					- List every id under the included taxa
				</Text>
				<Text>
					<Text color="cyan">
						taxindex validate --infile tree.msgpack --taxidvalidate ids.txt
					</Text>{" "}
					- Check a list of ids
				</Text>
			</Box>

			<Text>
				Use <Text color="cyan">taxindex &lt;command&gt; --help</Text> for the
				options of a command
			</Text>
		</Box>
	);
}
