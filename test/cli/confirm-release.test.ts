import { describe, expect, it, vi } from 'vitest'
import enquirer from 'enquirer'

import { confirmRelease } from '../../cli/confirm-release'

vi.mock('enquirer', () => ({ default: { prompt: vi.fn() } }))

describe('confirmRelease', () => {
  it('returns the answer', async () => {
    vi.mocked(enquirer.prompt).mockResolvedValue({ proceed: true })
    await expect(confirmRelease('v1.0.0')).resolves.toBeTruthy()
    expect(enquirer.prompt).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Publish v1.0.0?', type: 'confirm' }),
    )
  })

  it('treats a cancelled prompt as a refusal', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.mocked(enquirer.prompt).mockRejectedValue('')
    await expect(confirmRelease('v1.0.0')).resolves.toBeFalsy()
  })

  it('propagates other prompt failures', async () => {
    vi.mocked(enquirer.prompt).mockRejectedValue(new Error('no tty'))
    await expect(confirmRelease('v1.0.0')).rejects.toThrow('no tty')
  })
})
