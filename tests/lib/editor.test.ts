/**
 * Tests for the editor runner
 */

import { describe, it, expect } from 'vitest'
import { ProcessEditor, resolveEditorCommand } from '../../src/lib/editor.js'
import { EditorError } from '../../src/lib/errors.js'

describe('editor', () => {
  describe('resolveEditorCommand', () => {
    it('should prefer VISUAL, then EDITOR, then config', () => {
      expect(resolveEditorCommand({ VISUAL: 'code -w', EDITOR: 'nano' }, { editor: 'vim' })).toBe('code -w')
      expect(resolveEditorCommand({ EDITOR: 'nano' }, { editor: 'vim' })).toBe('nano')
      expect(resolveEditorCommand({}, { editor: 'vim' })).toBe('vim')
      expect(resolveEditorCommand({})).toBe('vi')
    })
  })

  describe.skipIf(process.platform === 'win32')('ProcessEditor', () => {
    it('should resolve when the editor exits cleanly', async () => {
      await expect(new ProcessEditor('true').edit('/tmp/unused')).resolves.toBeUndefined()
    })

    it('should reject when the editor exits with an error', async () => {
      await expect(new ProcessEditor('false').edit('/tmp/unused')).rejects.toThrow(
        'Editor "false" failed: exited with code 1'
      )
    })

    it('should reject when the editor cannot be started', async () => {
      await expect(new ProcessEditor('keyseal-no-such-editor').edit('/tmp/unused')).rejects.toThrow(
        EditorError
      )
    })
  })
})
