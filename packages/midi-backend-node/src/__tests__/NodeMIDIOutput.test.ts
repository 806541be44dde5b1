/**
 * NodeMIDIOutput Unit Tests
 */

import { NodeMIDIOutput } from '../NodeMIDIOutput'

const mockOutput = {
  send: jest.fn(),
  close: jest.fn()
}

const mockMidi = {
  info: jest.fn(() => ({
    outputs: [
      { name: 'Test Output A', manufacturer: 'Test Manufacturer' },
      { name: 'Test Output B', manufacturer: 'Another Manufacturer' }
    ]
  })),
  openMidiOut: jest.fn(() => mockOutput)
}

const mockEngine = jest.fn((): Promise<unknown> => Promise.resolve(mockMidi))

// Mock jzz module
jest.mock('jzz', () => jest.fn(() => mockEngine()))

describe('NodeMIDIOutput', () => {
  let logSpy: jest.SpyInstance
  let warnSpy: jest.SpyInstance

  beforeEach(() => {
    jest.clearAllMocks()
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {})
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    logSpy.mockRestore()
    warnSpy.mockRestore()
  })

  describe('isSupported', () => {
    it('returns true in Node.js environment', async () => {
      expect(await NodeMIDIOutput.isSupported()).toBe(true)
    })
  })

  describe('init', () => {
    it('opens the first output and logs what it found', async () => {
      const output = new NodeMIDIOutput()
      expect(await output.init()).toBe(true)

      expect(mockMidi.openMidiOut).toHaveBeenCalledWith(0)
      expect(output.getOutputName()).toBe('Test Output A')
      expect(output.isReady()).toBe(true)
      expect(logSpy.mock.calls.map(call => call[0])).toEqual([
        'NodeMIDIOutput: Available MIDI outputs:',
        '  0: Test Output A',
        '  1: Test Output B',
        'NodeMIDIOutput: Using output "Test Output A"'
      ])
    })

    it('prefers the named output', async () => {
      const output = new NodeMIDIOutput({ preferredOutput: 'Test Output B', logOutputs: false })
      await output.init()
      expect(mockMidi.openMidiOut).toHaveBeenCalledWith(1)
      expect(output.getSelectedOutput()).toEqual({
        id: '1',
        name: 'Test Output B',
        manufacturer: 'Another Manufacturer'
      })
    })

    it('runs silently when there are no outputs', async () => {
      mockMidi.info.mockReturnValueOnce({ outputs: [] })
      const output = new NodeMIDIOutput()

      expect(await output.init()).toBe(false)
      expect(warnSpy).toHaveBeenCalledWith('NodeMIDIOutput: No MIDI outputs available')

      expect(() => output.sendNoteOn(9, 36, 127)).not.toThrow()
      expect(mockOutput.send).not.toHaveBeenCalled()
    })

    it('reports false when jzz cannot start', async () => {
      mockEngine.mockImplementationOnce(() => Promise.reject(new Error('no backend')))
      const output = new NodeMIDIOutput()

      expect(await output.init()).toBe(false)
      expect(output.isReady()).toBe(false)
      expect(warnSpy.mock.calls[0][0]).toBe('NodeMIDIOutput: JZZ unavailable:')
    })
  })

  describe('listOutputs', () => {
    it('numbers outputs and names unnamed ones', async () => {
      mockMidi.info.mockReturnValueOnce({
        outputs: [{ name: 'Test Output A', manufacturer: 'Test Manufacturer' }, { name: '', manufacturer: '' }]
      })
      const output = new NodeMIDIOutput()
      expect(await output.listOutputs()).toEqual([
        { id: '0', name: 'Test Output A', manufacturer: 'Test Manufacturer' },
        { id: '1', name: 'Output 1', manufacturer: undefined }
      ])
    })
  })

  describe('selectOutput', () => {
    it('closes the previous port', async () => {
      const output = new NodeMIDIOutput({ logOutputs: false })
      await output.init()

      expect(await output.selectOutput('1')).toBe(true)
      expect(mockOutput.close).toHaveBeenCalledTimes(1)
      expect(output.getOutputName()).toBe('Test Output B')
    })

    it('returns false for an unknown id', async () => {
      const output = new NodeMIDIOutput({ logOutputs: false })
      expect(await output.selectOutput('7')).toBe(false)
    })
  })

  describe('LiveSink', () => {
    it('sends note-on and note-off bytes', async () => {
      const output = new NodeMIDIOutput({ logOutputs: false })
      await output.init()

      output.sendNoteOn(9, 36, 127)
      output.sendNoteOff(9, 36, 127)

      expect(mockOutput.send.mock.calls).toEqual([
        [[0x99, 36, 127]],
        [[0x89, 36, 127]]
      ])
    })

    it('logs and drops send errors', async () => {
      const output = new NodeMIDIOutput({ logOutputs: false })
      await output.init()
      mockOutput.send.mockImplementationOnce(() => {
        throw new Error('device gone')
      })

      expect(() => output.sendNoteOn(9, 38, 127)).not.toThrow()
      expect(warnSpy.mock.calls[0][0]).toBe('NodeMIDIOutput: send failed:')
    })
  })

  describe('dispose', () => {
    it('silences the percussion channel and closes the port once', async () => {
      const output = new NodeMIDIOutput({ logOutputs: false })
      await output.init()

      output.dispose()
      output.dispose()

      expect(mockOutput.send.mock.calls).toEqual([[[0xB9, 123, 0]]])
      expect(mockOutput.close).toHaveBeenCalledTimes(1)
      expect(output.isReady()).toBe(false)
    })

    it('ignores sends after dispose', async () => {
      const output = new NodeMIDIOutput({ logOutputs: false })
      await output.init()
      output.dispose()
      mockOutput.send.mockClear()

      output.sendNoteOn(9, 36, 127)
      expect(mockOutput.send).not.toHaveBeenCalled()
    })
  })
})
