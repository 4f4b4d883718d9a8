import type {
	Diagnostic,
	DiagnosticLocation,
	Severity,
	SourcePosition,
} from "./types.js";

export const SEVERITY_MARKERS: Record<Severity, string> = {
	warning: "[*]",
	error: "[!]",
	fatal: "[!!!]",
};

/** `file[line,col]->crumb->crumb` */
export function formatLocation(location: DiagnosticLocation): string {
	const [file, ...crumbs] = location.path;
	if (file === undefined) return "";
	let result = file;
	if (location.position) {
		result += `[${location.position.line},${location.position.column}]`;
	}
	if (crumbs.length > 0) {
		result += `->${crumbs.join("->")}`;
	}
	return result;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
	return `${SEVERITY_MARKERS[diagnostic.severity]} ${formatLocation(diagnostic.location)}:\n${diagnostic.message}`;
}

export function at(
	path: string[],
	position?: SourcePosition,
): DiagnosticLocation {
	return position ? { path, position } : { path };
}

export interface ReporterOptions {
	warningsAsErrors?: boolean;
	onDiagnostic?: (diagnostic: Diagnostic) => void;
}

export type DiagnosticCounts = Record<Severity, number>;

export interface DiagnosticReporter {
	error(message: string, location: DiagnosticLocation): void;
	fatal(message: string, location: DiagnosticLocation): void;
	/** Style findings; reported as errors when warnings are promoted. */
	warn(message: string, location: DiagnosticLocation): void;
	counts(): DiagnosticCounts;
	diagnostics(): readonly Diagnostic[];
	drain(): Diagnostic[];
	hasErrors(): boolean;
	exitCode(): number;
}

export function createReporter(options: ReporterOptions = {}): DiagnosticReporter {
	let pending: Diagnostic[] = [];
	const counts: DiagnosticCounts = { warning: 0, error: 0, fatal: 0 };

	function push(
		severity: Severity,
		message: string,
		location: DiagnosticLocation,
	): void {
		const diagnostic: Diagnostic = { severity, message, location };
		counts[severity]++;
		pending.push(diagnostic);
		options.onDiagnostic?.(diagnostic);
	}

	return {
		error: (message, location) => push("error", message, location),
		fatal: (message, location) => push("fatal", message, location),
		warn: (message, location) =>
			push(options.warningsAsErrors ? "error" : "warning", message, location),
		counts: () => ({ ...counts }),
		diagnostics: () => pending,
		drain() {
			const drained = pending;
			pending = [];
			return drained;
		},
		hasErrors: () => counts.error > 0 || counts.fatal > 0,
		exitCode() {
			return counts.error > 0 || counts.fatal > 0 ? 1 : 0;
		},
	};
}
