import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest'
import assVtt, {
	ASS_PARSE_FAILED_CODE,
	AssParsingError,
	convertAssFileToVtt,
	convertAssFileToVttFile,
	convertAssStringToVtt,
	isAssConverterError,
	logger,
} from '@subforge/ass-vtt'

const STYLE_FORMAT =
	'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding'
const EVENT_FORMAT = 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text'
const DEFAULT_STYLE =
	'Style: Default,Arial,48,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,0,0,2,10,10,0,1'

function script(events: string[], styles: string[] = [DEFAULT_STYLE], info: string[] = []) {
	return [
		'[Script Info]',
		'ScriptType: v4.00+',
		...info,
		'',
		'[V4+ Styles]',
		STYLE_FORMAT,
		...styles,
		'',
		'[Events]',
		EVENT_FORMAT,
		...events,
	].join('\n')
}

describe('convertAssStringToVtt', () => {
	it('converts a plain cue with default placement', () => {
		const vtt = convertAssStringToVtt(script(['Dialogue: 0,0:00:01.00,0:00:03.00,Default,,0,0,0,,Hello']))

		expect(vtt).toBe(
			[
				'WEBVTT',
				'',
				'STYLE',
				'::cue(.Default) { color: #ffffff; }',
				'',
				'1',
				'00:00:01.000 --> 00:00:03.000',
				'Hello',
				'',
			].join('\n'),
		)
	})

	it('renders bold overrides as markup', () => {
		const vtt = convertAssStringToVtt(
			script(['Dialogue: 0,0:00:01.00,0:00:03.00,Default,,0,0,0,,{\\b1}Hello{\\b0} World']),
		)
		expect(vtt.split('\n')).toContain('<b>Hello</b> World')
	})

	it('lets \\an8 override the style alignment', () => {
		const vtt = convertAssStringToVtt(
			script(['Dialogue: 0,0:00:01.00,0:00:03.00,Default,,0,0,0,,{\\an8}Top']),
		)
		expect(vtt.split('\n')).toContain(
			'00:00:01.000 --> 00:00:03.000 align:center line:2% line-align:start position:auto',
		)
	})

	it('writes one rule per contributing style in table order', () => {
		const vtt = convertAssStringToVtt(
			script(
				['Dialogue: 0,0:00:01.00,0:00:03.00,Default,,0,0,0,,Hi'],
				[
					DEFAULT_STYLE,
					'Style: Sign,Arial,36,&H0000FFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,0,0,8,10,10,0,1',
				],
			),
		)
		const rules = vtt.split('\n').filter((line) => line.startsWith('::cue('))
		expect(rules).toEqual(['::cue(.Default) { color: #ffffff; }', '::cue(.Sign) { color: #ffff00; }'])
	})

	it('returns only the header for an empty Events section', () => {
		expect(convertAssStringToVtt(script([]))).toBe('WEBVTT\n')
		expect(
			convertAssStringToVtt(script(['Comment: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,skip'])),
		).toBe('WEBVTT\n')
	})

	it('uses resolution hints for \\pos when the script declares none', () => {
		const vtt = convertAssStringToVtt(
			script(['Dialogue: 0,0:00:01.00,0:00:02.00,Default,,0,0,0,,{\\pos(64,36)}Corner']),
			{ playResX: 640, playResY: 360 },
		)
		expect(vtt.split('\n')).toContain(
			'00:00:01.000 --> 00:00:02.000 align:start line:10% line-align:start position:10% position-align:line-left',
		)
	})

	it('ignores invalid options instead of failing', () => {
		const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {})
		const vtt = convertAssStringToVtt(
			script(['Dialogue: 0,0:00:01.00,0:00:02.00,Default,Bob,0,0,0,,Hey']),
			{ playResX: -5 },
		)

		expect(vtt.split('\n')).toContain('<v.Default Bob>Hey</v>')
		expect(warn).toHaveBeenCalledWith(
			'convert',
			'Ignoring invalid conversion options (playResX: Number must be greater than or equal to 0)',
		)
		warn.mockRestore()
	})

	it('raises a structured parse error for text without sections', () => {
		let caught: unknown
		try {
			convertAssStringToVtt('just some words')
		} catch (error) {
			caught = error
		}
		expect(caught).toBeInstanceOf(AssParsingError)
		expect(isAssConverterError(caught) && caught.code).toBe(ASS_PARSE_FAILED_CODE)
	})

	it('exposes the conversion functions on the default export', () => {
		expect(assVtt.convertAssStringToVtt).toBe(convertAssStringToVtt)
	})
})

describe('file conversion', () => {
	let dir = ''

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), 'ass-vtt-convert-'))
	})

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('converts a UTF-16 file and writes UTF-8 output', async () => {
		const input = join(dir, 'episode.ass')
		const output = join(dir, 'episode.vtt')
		const content = script(
			['Dialogue: 0,0:00:02.50,0:00:04.00,Default,,0,0,0,,Cześć\\Nświecie'],
			[DEFAULT_STYLE],
			['PlayResX: 1920', 'PlayResY: 1080'],
		)
		await writeFile(input, Buffer.from(`\uFEFF${content}`, 'utf16le'))

		await convertAssFileToVttFile(input, output)
		const written = await readFile(output, 'utf8')

		expect(written).toBe(await convertAssFileToVtt(input))
		expect(written).toBe(
			'WEBVTT\n\nSTYLE\n::cue(.Default) { color: #ffffff; }\n\n1\n00:00:02.500 --> 00:00:04.000\nCześć\nświecie\n',
		)
	})

	it('fails with a parse error for a missing input file', async () => {
		await expect(convertAssFileToVtt(join(dir, 'nope.ass'))).rejects.toBeInstanceOf(AssParsingError)
	})
})
