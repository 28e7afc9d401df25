import { cancel, isCancel, text } from "@clack/prompts";

export async function promptForPath(): Promise<string | null> {
	const selection = await text({
		message: "Path to sanitize",
		placeholder: "../archive/entry.txt",
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return null;
	}
	return selection ?? "";
}
