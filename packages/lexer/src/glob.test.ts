import { describe, expect, test } from 'vitest'
import { baseName, globToRegExp } from './glob'

describe('globToRegExp', () => {
	test('matches any run of characters for *', () => {
		const glob = globToRegExp('*.go')
		expect(glob.test('main.go')).toBe(true)
		expect(glob.test('.go')).toBe(true)
		expect(glob.test('main.gob')).toBe(false)
	})

	test('matches a single character for ?', () => {
		const glob = globToRegExp('?.c')
		expect(glob.test('a.c')).toBe(true)
		expect(glob.test('ab.c')).toBe(false)
	})

	test('treats other characters literally', () => {
		const glob = globToRegExp('*.c++')
		expect(glob.test('x.c++')).toBe(true)
		expect(glob.test('x.cc')).toBe(false)
	})
})

describe('globToRegExp character classes', () => {
	test('matches one character of a class', () => {
		const glob = globToRegExp('*.[ch]')
		expect(glob.test('main.c')).toBe(true)
		expect(glob.test('main.h')).toBe(true)
		expect(glob.test('main.o')).toBe(false)
		expect(glob.test('main.ch')).toBe(false)
	})

	test('supports ranges and negation', () => {
		expect(globToRegExp('v[0-9].txt').test('v7.txt')).toBe(true)
		expect(globToRegExp('v[0-9].txt').test('vx.txt')).toBe(false)
		expect(globToRegExp('[!.]*').test('.bashrc')).toBe(false)
		expect(globToRegExp('[!.]*').test('bashrc')).toBe(true)
		expect(globToRegExp('[^.]*').test('.bashrc')).toBe(false)
	})

	test('keeps a leading ] inside the class', () => {
		const glob = globToRegExp('[]x]')
		expect(glob.test(']')).toBe(true)
		expect(glob.test('x')).toBe(true)
		expect(glob.test('y')).toBe(false)
	})

	test('treats an unclosed [ literally', () => {
		const glob = globToRegExp('a[b')
		expect(glob.test('a[b')).toBe(true)
		expect(glob.test('ab')).toBe(false)
	})

	test('throws on a reversed range', () => {
		expect(() => globToRegExp('[z-a]')).toThrow(SyntaxError)
	})
})

describe('baseName', () => {
	test('strips either separator', () => {
		expect(baseName('a/b/c.ts')).toBe('c.ts')
		expect(baseName('a\\b\\c.ts')).toBe('c.ts')
		expect(baseName('c.ts')).toBe('c.ts')
	})
})
