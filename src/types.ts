export interface SourcePosition {
	line: number;
	column: number;
}

export interface Translation {
	language: string;
	text: string;
	/** First character of the text content. */
	textPosition: SourcePosition;
}

export interface Entry {
	id?: string;
	position: SourcePosition;
	translations: Translation[];
}

export type Severity = "warning" | "error" | "fatal";

export interface DiagnosticLocation {
	/** File name first, then breadcrumbs such as `Entries`, `Entry('X')`, `de-DE`. */
	path: string[];
	position?: SourcePosition;
}

export interface Diagnostic {
	severity: Severity;
	message: string;
	location: DiagnosticLocation;
}

export interface PreviewOptions {
	enabled: boolean;
	output: string;
}

export interface FmtguardConfig {
	index: string;
	include?: string[];
	exclude?: string[];
	referenceLanguage: string;
	showLang?: string;
	warningsAsErrors: boolean;
	displayLimit: number;
	preview: PreviewOptions;
}
