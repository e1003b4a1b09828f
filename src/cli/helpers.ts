import readline from "readline";

/**
 * Ask a free-text question and resolve with the trimmed answer.
 */
export async function askText(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer: string) => resolve(answer.trim()));
  });
}

/**
 * Ask the user to choose from a menu of options
 */
export async function askMenu(
  rl: readline.Interface,
  options: string[]
): Promise<number> {
  return new Promise((resolve) => {
    console.log("What would you like to do?\n");
    options.forEach((opt, i) => {
      console.log(`  ${i + 1}. ${opt}`);
    });
    console.log("");

    const askChoice = () => {
      rl.question("> ", (answer: string) => {
        const choice = parseInt(answer, 10);
        if (choice >= 1 && choice <= options.length) {
          resolve(choice);
        } else {
          console.log(`Please enter a number between 1 and ${options.length}`);
          askChoice();
        }
      });
    };
    askChoice();
  });
}

/**
 * Ask for a whole number within a range, re-asking until one is given.
 */
export async function askNumberInRange(
  rl: readline.Interface,
  prompt: string,
  min: number,
  max: number
): Promise<number> {
  for (;;) {
    const answer = await askText(rl, prompt);
    const value = Number(answer);
    if (Number.isInteger(value) && value >= min && value <= max) {
      return value;
    }
    console.log(`Please enter a number from ${min} to ${max}`);
  }
}

export function renderProgressBar(value: number, max: number, width: number): string {
  const percentage = max > 0 ? Math.min(value / max, 1) : 0;
  const filled = Math.round(percentage * width);
  const empty = width - filled;

  const filledChar = "█";
  const emptyChar = "░";

  return `[${filledChar.repeat(filled)}${emptyChar.repeat(empty)}]`;
}
