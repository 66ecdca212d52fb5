import inquirer from 'inquirer';

export interface ConfirmOptions {
  yes?: boolean;
  nonInteractive?: boolean;
}

/**
 * Prompts the user for confirmation.
 *
 * @param action The action being confirmed (e.g. "Remove 3 training runs?")
 * @param details Optional details or warning message
 * @param defaultNo Whether the default choice should be 'No' (default: true)
 * @returns boolean indicating if the user confirmed
 */
export async function confirm(
  action: string,
  details?: string,
  defaultNo: boolean = true,
  options: ConfirmOptions = {},
): Promise<boolean> {
  if (options.yes) {
    return true;
  }

  // Without a TTY there is nobody to answer
  if (options.nonInteractive || !process.stdin.isTTY) {
    return false;
  }

  const response = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: details ? `${action}\n${details}` : action,
      default: !defaultNo,
    },
  ]);
  return response.confirmed;
}
