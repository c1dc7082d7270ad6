export const DEFAULT_TAG_COUNT = 49;

/** Output tokens requested per image in a call */
export const TOKENS_PER_IMAGE = 1000;

export function buildInstruction(
	imageCount: number,
	tagCount = DEFAULT_TAG_COUNT,
): string {
	const persona =
		"You are a popular Adobe Stock contributor. " +
		`Analyze the image and provide a title and exactly ${tagCount} tags that suit Adobe Stock.`;
	if (imageCount <= 1) {
		return (
			`${persona} Format your response as a JSON object with 'title' and 'tags' keys. ` +
			"The 'tags' should be an array of strings."
		);
	}
	return (
		`${persona} You will receive ${imageCount} images. Do this for each of them. ` +
		`Format your response as a JSON array of exactly ${imageCount} objects, one per image ` +
		"in the order the images were given, each with 'title' and 'tags' keys. " +
		"The 'tags' should be an array of strings."
	);
}
