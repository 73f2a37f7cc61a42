import enquirer from 'enquirer'
import pc from 'picocolors'

/** Answer shape of the confirmation prompt. */
interface ConfirmResult {
  /** Whether to publish. */
  proceed: boolean
}

/**
 * Ask the user to confirm publishing.
 *
 * @param target - What is about to be published, e.g. `v1.2.0`.
 * @returns True when the user confirmed.
 */
export async function confirmRelease(target: string): Promise<boolean> {
  try {
    let { proceed } = await enquirer.prompt<ConfirmResult>({
      message: `Publish ${target}?`,
      type: 'confirm',
      name: 'proceed',
      initial: false,
    })
    return proceed
  } catch (error) {
    /** Enquirer rejects with an empty value when the prompt is cancelled. */
    if (error === '' || error === undefined) {
      console.info(pc.gray('\nRelease cancelled'))
      return false
    }
    throw error
  }
}
