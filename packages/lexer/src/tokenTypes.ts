/**
 * Token type taxonomy.
 *
 * Types are dotted scopes, most general first: `literal.string.escape` is a
 * kind of `literal.string`, which is a kind of `literal`.
 */
export const TokenType = {
	/** Input that no rule in the active state matched */
	Error: 'error',
	Other: 'other',

	Text: 'text',
	Whitespace: 'text.whitespace',

	Keyword: 'keyword',
	KeywordConstant: 'keyword.constant',
	KeywordDeclaration: 'keyword.declaration',
	KeywordNamespace: 'keyword.namespace',
	KeywordReserved: 'keyword.reserved',
	KeywordType: 'keyword.type',

	Name: 'name',
	NameAttribute: 'name.attribute',
	NameBuiltin: 'name.builtin',
	NameClass: 'name.class',
	NameConstant: 'name.constant',
	NameDecorator: 'name.decorator',
	NameFunction: 'name.function',
	NameLabel: 'name.label',
	NameNamespace: 'name.namespace',
	NameProperty: 'name.property',
	NameTag: 'name.tag',
	NameVariable: 'name.variable',

	Literal: 'literal',
	LiteralDate: 'literal.date',
	LiteralString: 'literal.string',
	LiteralStringChar: 'literal.string.char',
	LiteralStringDoc: 'literal.string.doc',
	LiteralStringEscape: 'literal.string.escape',
	LiteralStringInterpol: 'literal.string.interpol',
	LiteralStringRegex: 'literal.string.regex',
	LiteralNumber: 'literal.number',
	LiteralNumberFloat: 'literal.number.float',
	LiteralNumberHex: 'literal.number.hex',
	LiteralNumberInteger: 'literal.number.integer',

	Operator: 'operator',
	OperatorWord: 'operator.word',
	Punctuation: 'punctuation',

	Comment: 'comment',
	CommentMultiline: 'comment.multiline',
	CommentPreproc: 'comment.preproc',
	CommentSingle: 'comment.single',

	Generic: 'generic',
	GenericDeleted: 'generic.deleted',
	GenericHeading: 'generic.heading',
	GenericInserted: 'generic.inserted',
} as const

export type TokenType = (typeof TokenType)[keyof typeof TokenType]

/**
 * Top-level category of a token type (`name.function` → `name`)
 */
export const tokenCategory = (type: TokenType): string => {
	const dot = type.indexOf('.')
	return dot === -1 ? type : type.slice(0, dot)
}

/**
 * True when `type` is `ancestor` or one of its dotted descendants
 */
export const isTokenType = (type: TokenType, ancestor: TokenType): boolean =>
	type === ancestor || type.startsWith(`${ancestor}.`)
