export type XmpFields = {
	title: string;
	keywords: readonly string[];
	authors: string;
};

export function escapeXml(str: string): string {
	return str
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}

function alt(tag: string, value: string): string {
	return `   <${tag}>
    <rdf:Alt>
     <rdf:li xml:lang="x-default">${escapeXml(value)}</rdf:li>
    </rdf:Alt>
   </${tag}>`;
}

function list(tag: string, kind: "Seq" | "Bag", values: readonly string[]): string {
	const items = values.map((v) => `     <rdf:li>${escapeXml(v)}</rdf:li>`);
	return [`   <${tag}>`, `    <rdf:${kind}>`, ...items, `    </rdf:${kind}>`, `   </${tag}>`].join("\n");
}

/** Dublin Core packet: title, description, creator and subject. No timestamps. */
export function buildXmpPacket(fields: XmpFields): string {
	const properties = [
		alt("dc:title", fields.title),
		alt("dc:description", fields.title),
		...(fields.authors ? [list("dc:creator", "Seq", [fields.authors])] : []),
		list("dc:subject", "Bag", fields.keywords),
	];
	return [
		'<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
		'<x:xmpmeta xmlns:x="adobe:ns:meta/">',
		' <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
		'  <rdf:Description rdf:about="" xmlns:dc="http://purl.org/dc/elements/1.1/">',
		...properties,
		"  </rdf:Description>",
		" </rdf:RDF>",
		"</x:xmpmeta>",
		'<?xpacket end="w"?>',
	].join("\n");
}
