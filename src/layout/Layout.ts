import { Guard } from '../common/core/Guard';
import { err, ok, Result } from '../common/core/Result';
import { InputError } from '../common/infrastructure/InfrastructureErrors';
import { layoutRenderers, LayoutRenderer, OutputFormatValues } from './layoutRenderers';
import { LogEventInfo } from './LogEventInfo';

interface LiteralPart {
	kind: 'literal';
	text: string;
}

interface RendererPart {
	kind: 'renderer';
	renderer: LayoutRenderer;
	options: Map<string, Layout>;
	whenEmpty?: Layout;
}

type LayoutPart = LiteralPart | RendererPart;

// thrown inside the parser only; Layout.parse turns it into an InputError
class LayoutSyntaxError extends Error {
	constructor(message: string, readonly position: number) {
		super(message);
	}
}

const optionNameRegExp = /^[A-Za-z][A-Za-z0-9_-]*=/;

class LayoutParser {
	private _pos = 0;

	constructor(private readonly _text: string) {}

	public parseAll(): LayoutPart[] {
		return this.parseParts('');
	}

	// reads until one of stopChars at this nesting level, or the end of the text
	private parseParts(stopChars: string): LayoutPart[] {
		const parts: LayoutPart[] = [];
		let literal = '';

		while (this._pos < this._text.length) {
			const ch = this._text[this._pos];
			if (ch === '\\' && this._pos + 1 < this._text.length) {
				literal += this._text[this._pos + 1];
				this._pos += 2;
			} else if (this._text.startsWith('${', this._pos)) {
				if (literal) parts.push({ kind: 'literal', text: literal });
				literal = '';
				parts.push(this.parseRenderer());
			} else if (stopChars.includes(ch)) {
				break;
			} else {
				literal += ch;
				this._pos++;
			}
		}

		if (literal) parts.push({ kind: 'literal', text: literal });
		return parts;
	}

	private parseRenderer(): RendererPart {
		const start = this._pos;
		this._pos += 2;

		let name = '';
		while (this._pos < this._text.length && !':}'.includes(this._text[this._pos])) {
			name += this._text[this._pos++];
		}
		name = name.trim();
		if (this._pos >= this._text.length) throw new LayoutSyntaxError(`unterminated '\${'`, start);
		if (!name) throw new LayoutSyntaxError('missing renderer name', start);

		const renderer = layoutRenderers.get(name.toLowerCase());
		if (!renderer) throw new LayoutSyntaxError(`unknown renderer '${name}'`, start);

		const options = new Map<string, Layout>();
		let whenEmpty: Layout | undefined;

		while (this._text[this._pos] === ':') {
			this._pos++;
			const named = optionNameRegExp.exec(this._text.slice(this._pos));
			let optionName: string;
			if (named) {
				optionName = named[0].slice(0, -1);
				this._pos += named[0].length;
			} else if (renderer.defaultOption) {
				optionName = renderer.defaultOption;
			} else {
				throw new LayoutSyntaxError(`renderer '${name}' takes no default option`, start);
			}

			const value = new Layout(this.parseParts(':}'));
			if (optionName === 'whenEmpty') {
				whenEmpty = value;
			} else if (renderer.options.includes(optionName)) {
				options.set(optionName, value);
			} else {
				throw new LayoutSyntaxError(`renderer '${name}' has no option '${optionName}'`, start);
			}
		}

		if (this._text[this._pos] !== '}') throw new LayoutSyntaxError(`unterminated '\${'`, start);
		this._pos++;

		const outputFormat = options.get('outputFormat');
		if (outputFormat && outputFormat.isLiteral) {
			// case-insensitive, as renderers compare it
			const format = OutputFormatValues.find((value) => value.toLowerCase() === outputFormat.text.toLowerCase());
			const formatResult = Guard.isOneOf(format ?? outputFormat.text, OutputFormatValues, 'outputFormat');
			if (formatResult.isErr()) throw new LayoutSyntaxError(formatResult.error.message, start);
		}

		return { kind: 'renderer', renderer, options, whenEmpty };
	}
}

/**
 * A parsed template such as `${event-properties:url:whenEmpty=${request-url}}`, rendered per log event.
 */
export class Layout {
	private readonly _parts: LayoutPart[];

	constructor(parts: LayoutPart[]) {
		this._parts = parts;
	}

	public static parse(text: string): Result<Layout, InputError> {
		try {
			return ok(new Layout(new LayoutParser(text).parseAll()));
		} catch (e) {
			if (e instanceof LayoutSyntaxError) {
				return err(new InputError(`invalid layout | ${e.message}`, { layout: text, position: e.position }));
			}
			throw e;
		}
	}

	// true when no part depends on the event
	public get isLiteral(): boolean {
		return this._parts.every((part) => part.kind === 'literal');
	}

	// literal text only; renderer parts are left out
	public get text(): string {
		return this._parts.map((part) => (part.kind === 'literal' ? part.text : '')).join('');
	}

	public render(event: LogEventInfo): string {
		let rendered = '';
		for (const part of this._parts) {
			rendered += part.kind === 'literal' ? part.text : this.renderPart(part, event);
		}
		return rendered;
	}

	private renderPart(part: RendererPart, event: LogEventInfo): string {
		const value = part.renderer.render(event, {
			option: (name) => part.options.get(name)?.render(event),
		});
		if (value === '' && part.whenEmpty) return part.whenEmpty.render(event);
		return value;
	}
}
