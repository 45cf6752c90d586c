import { promises as fs } from 'fs'
import * as os from 'os'
import * as path from 'path'
import { RecordingError, RecordingErrorCode } from '@/lib/core/errors'
import {
  exportRecording,
  parseRecording,
  readRecording,
  serializeRecording,
  toFileSystemError
} from '@/lib/storage/recording-io'
import { logger } from '@/lib/utils/logger'
import type { RecordedAction } from '@/types/recording'

function errnoError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code })
}

const sampleActions: RecordedAction[] = [
  { timestamp: 0.012, type: 'mouse_button_down', details: { location: { x: 640, y: 360 }, button: 'left' } },
  { timestamp: 0.134, type: 'mouse_button_up', details: { location: { x: 640, y: 360 }, button: 'left' } },
  { timestamp: 0.5, type: 'mouse_scroll', details: { location: { x: 640, y: 400 }, scroll_delta: { dx: 0, dy: -2 } } },
  { timestamp: 1.25, type: 'key_press', details: { key: 'h' } },
  { timestamp: 1.3333333333333333, type: 'key_release', details: { key: 'h' } }
]

describe('recording-io', () => {
  let directory: string

  beforeAll(() => {
    logger.configure({ minLevel: 'silent' })
  })

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'recording-io-test-'))
  })

  afterEach(async () => {
    jest.restoreAllMocks()
    await fs.rm(directory, { recursive: true, force: true })
  })

  describe('serializeRecording', () => {
    it('writes an indented array with a trailing newline', () => {
      const text = serializeRecording([{ timestamp: 0.25, type: 'key_press', details: { key: 'a' } }])

      expect(text).toBe([
        '[',
        '  {',
        '    "timestamp": 0.25,',
        '    "type": "key_press",',
        '    "details": {',
        '      "key": "a"',
        '    }',
        '  }',
        ']',
        ''
      ].join('\n'))
    })

    it('writes an empty log as an empty array', () => {
      expect(serializeRecording([])).toBe('[]\n')
    })
  })

  describe('exportRecording', () => {
    it('creates missing directories and writes the file', async () => {
      const nested = path.join(directory, 'a', 'b')

      const result = await exportRecording(sampleActions, { directory: nested, filename: 'out.json' })

      const target = path.join(nested, 'out.json')
      expect(result).toEqual({ success: true, data: { path: target, actionCount: 5 } })
      expect(await fs.readFile(target, 'utf8')).toBe(serializeRecording(sampleActions))
    })

    it('overwrites an existing file', async () => {
      await fs.writeFile(path.join(directory, 'out.json'), 'stale')

      await exportRecording([], { directory, filename: 'out.json' })

      expect(await fs.readFile(path.join(directory, 'out.json'), 'utf8')).toBe('[]\n')
    })

    it('round-trips through parseRecording', async () => {
      await exportRecording(sampleActions, { directory, filename: 'round-trip.json' })

      const loaded = await readRecording(path.join(directory, 'round-trip.json'))

      expect(loaded).toHaveLength(sampleActions.length)
      loaded.forEach((action, i) => {
        expect(action.type).toBe(sampleActions[i].type)
        expect(action.details).toEqual(sampleActions[i].details)
        expect(action.timestamp).toBeCloseTo(sampleActions[i].timestamp, 9)
      })
    })

    it.each(['nested/out.json', '', '..'])('rejects %p as a file name', async (filename) => {
      const result = await exportRecording(sampleActions, { directory, filename })

      expect(result).toMatchObject({ success: false, code: RecordingErrorCode.INVALID_PATH })
      expect(await fs.readdir(directory)).toEqual([])
    })

    it('reports a directory that runs through a file as an invalid path', async () => {
      const blocker = path.join(directory, 'blocker')
      await fs.writeFile(blocker, '')

      const result = await exportRecording(sampleActions, { directory: path.join(blocker, 'sub'), filename: 'out.json' })

      expect(result).toMatchObject({ success: false, code: RecordingErrorCode.INVALID_PATH })
    })

    it('reports a directory without write access', async () => {
      jest.spyOn(fs, 'access').mockRejectedValueOnce(errnoError('EACCES'))

      const result = await exportRecording(sampleActions, { directory, filename: 'out.json' })

      expect(result).toEqual({
        success: false,
        error: `Permission error: cannot write to directory ${directory}`,
        code: RecordingErrorCode.PERMISSION_DENIED
      })
      expect(await fs.readdir(directory)).toEqual([])
    })

    it('reports write failures as I/O errors', async () => {
      jest.spyOn(fs, 'writeFile').mockRejectedValueOnce(errnoError('EIO', 'disk on fire'))

      const result = await exportRecording(sampleActions, { directory, filename: 'out.json' })

      expect(result).toEqual({
        success: false,
        error: `Failed to write file ${path.join(directory, 'out.json')}: disk on fire`,
        code: RecordingErrorCode.IO_FAILURE
      })
    })

    it('reports failures without an errno code as unexpected', async () => {
      jest.spyOn(fs, 'writeFile').mockRejectedValueOnce('boom')

      const result = await exportRecording(sampleActions, { directory, filename: 'out.json' })

      expect(result).toMatchObject({ success: false, code: RecordingErrorCode.UNKNOWN_ERROR })
    })

    it('reports serialization failures without touching the disk', async () => {
      const details = Object.assign({ key: 'a' }, {
        toJSON: () => {
          throw new TypeError('cannot encode')
        }
      })
      const target = path.join(directory, 'never')

      const result = await exportRecording([{ timestamp: 0, type: 'key_press', details }], { directory: target, filename: 'out.json' })

      expect(result).toEqual({
        success: false,
        error: 'Error during serialization of the action log to JSON: cannot encode',
        code: RecordingErrorCode.SERIALIZATION_FAILED
      })
      expect(await fs.readdir(directory)).toEqual([])
    })

    it('logs the failure for the operator', async () => {
      const sink = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }
      logger.configure({ minLevel: 'error', sink })

      try {
        await exportRecording(sampleActions, { directory, filename: '' })
      } finally {
        logger.configure({ minLevel: 'silent', sink: console })
      }

      expect(sink.error).toHaveBeenCalledWith('[ERROR]', '[RecordingIO]', 'Invalid path: "" is not a file name')
    })
  })

  describe('toFileSystemError', () => {
    it.each([
      ['EACCES', RecordingErrorCode.PERMISSION_DENIED],
      ['EPERM', RecordingErrorCode.PERMISSION_DENIED],
      ['EROFS', RecordingErrorCode.PERMISSION_DENIED],
      ['ENOENT', RecordingErrorCode.INVALID_PATH],
      ['ENOTDIR', RecordingErrorCode.INVALID_PATH],
      ['ENOSPC', RecordingErrorCode.IO_FAILURE]
    ])('maps %s to %s', (code, expected) => {
      expect(toFileSystemError(errnoError(code), '/tmp/x').code).toBe(expected)
    })
  })

  describe('parseRecording', () => {
    it('keeps unknown keys', () => {
      const text = JSON.stringify([
        { timestamp: 0.5, type: 'key_press', details: { key: 'a', layout: 'us' }, window: 'editor' }
      ])

      expect(parseRecording(text)).toEqual([
        { timestamp: 0.5, type: 'key_press', details: { key: 'a', layout: 'us' }, window: 'editor' }
      ])
    })

    it('rejects text that is not JSON', () => {
      expect(() => parseRecording('not json')).toThrow(RecordingError)
      expect(() => parseRecording('not json')).toThrow(/^Recording is not valid JSON/)
    })

    it('rejects a document that is not an array', () => {
      expect(() => parseRecording('{}')).toThrow(expect.objectContaining({ code: RecordingErrorCode.INVALID_RECORDING }))
    })

    it('names the offending entry', () => {
      const text = JSON.stringify([
        { timestamp: 0, type: 'key_press', details: { key: 'a' } },
        { timestamp: -1, type: 'key_release', details: { key: 'a' } }
      ])

      expect(() => parseRecording(text)).toThrow(/at 1\.timestamp/)
    })

    it('rejects unknown action types', () => {
      const text = JSON.stringify([{ timestamp: 0, type: 'mouse_move', details: { location: { x: 0, y: 0 } } }])

      expect(() => parseRecording(text)).toThrow(expect.objectContaining({ code: RecordingErrorCode.INVALID_RECORDING }))
    })

    it('rejects fractional coordinates', () => {
      const text = JSON.stringify([
        { timestamp: 0, type: 'mouse_button_down', details: { location: { x: 1.5, y: 0 }, button: 'left' } }
      ])

      expect(() => parseRecording(text)).toThrow(/at 0\.details\.location\.x/)
    })
  })

  describe('readRecording', () => {
    it('reports a missing file as an invalid path', async () => {
      await expect(readRecording(path.join(directory, 'missing.json'))).rejects.toMatchObject({
        code: RecordingErrorCode.INVALID_PATH
      })
    })
  })
})
