import readline from "readline";
import { createTutor } from "../services";
import { SessionController } from "../services/sessionController";
import { ActivitySpec } from "../domain/activity";
import { CollaboratorError, TutorError } from "../domain/errors";
import { MAX_FACT_FAMILY, MIN_FACT_FAMILY } from "../domain/session";
import { askMenu, askNumberInRange, askText } from "./helpers";
import { showProgressSummary } from "./progressSummary";

type Outcome = "continue" | "pause" | "end";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout
});

/**
 * Start a new session or pick up a paused one
 */
async function chooseSession(controller: SessionController): Promise<string | null> {
  const paused = controller.listSessions().filter(s => s.status === "paused");

  const options = ["Start a new session"];
  if (paused.length > 0) options.push("Resume a paused session");
  options.push("Quit");

  const choice = await askMenu(rl, options);
  const picked = options[choice - 1];

  if (picked === "Start a new session") {
    const name = await askText(rl, "What is your name?\n> ");
    const max = await askNumberInRange(
      rl,
      `Which times tables should we practice, up to? (${MIN_FACT_FAMILY}-${MAX_FACT_FAMILY})\n> `,
      MIN_FACT_FAMILY,
      MAX_FACT_FAMILY
    );
    const started = await controller.start(name || "Friend", max);
    console.log(`\n${started.message}\n`);
    return started.sessionId;
  }

  if (picked === "Resume a paused session") {
    console.log("\nChoose a session:\n");
    const sessionChoice = await askMenu(
      rl,
      paused.map(s => `${s.studentName} · ${s.history.length} answered · paused ${new Date(s.pausedAt ?? s.lastActivityAt).toLocaleString()}`)
    );
    const session = paused[sessionChoice - 1];
    const resumed = await controller.resume(session.id);
    console.log(`\n${resumed.message}\n`);
    return session.id;
  }

  return null;
}

/**
 * Check for "pause" / "end" typed instead of an answer
 */
function commandFrom(input: string): Outcome | null {
  const lower = input.toLowerCase();
  if (lower === "pause") return "pause";
  if (lower === "end" || lower === "quit") return "end";
  return null;
}

async function runActivity(
  controller: SessionController,
  sessionId: string,
  activity: ActivitySpec
): Promise<Outcome> {
  switch (activity.type) {
    case "math_drill": {
      console.log(`\n🔢 ${activity.question}`);
      const input = await askText(rl, "> ");
      const command = commandFrom(input);
      if (command) return command;

      const result = await controller.submitMathAnswer(sessionId, input, activity.id);
      console.log(`\n${result.correct ? "✅" : "❌"} ${result.feedback}`);
      if (result.bonusFact) {
        console.log(`\n💡 ${result.bonusFact}`);
      }
      console.log(`   ${result.totalQuestions} answered · ${result.accuracy}% correct · streak ${result.streak}`);
      return "continue";
    }

    case "fact":
    case "number_fact": {
      console.log(`\n🌟 Fun fact! ${activity.content}`);
      const input = await askText(rl, "(press Enter to continue)\n> ");
      return commandFrom(input) ?? "continue";
    }

    case "quiz": {
      console.log(`\n🧠 Quiz time! ${activity.question}\n`);
      for (const [key, text] of Object.entries(activity.options)) {
        console.log(`   ${key}) ${text}`);
      }
      const input = await askText(rl, "\n> ");
      const command = commandFrom(input);
      if (command) return command;

      const result = await controller.submitQuizAnswer({ id: activity.id, correctAnswer: activity.correctAnswer }, input, sessionId);
      console.log(`\n${result.correct ? "✅" : "❌"} ${result.feedback}`);
      if (result.explanation) {
        console.log(`   ${result.explanation}`);
      }
      return "continue";
    }
  }
}

/**
 * Serve the next activity; when fun content cannot be generated, carry on
 * with a drill.
 */
async function nextActivity(controller: SessionController, sessionId: string): Promise<ActivitySpec> {
  try {
    return await controller.nextActivity(sessionId);
  } catch (error) {
    if (!(error instanceof CollaboratorError)) throw error;
    console.log("\n(Fun facts are taking a nap right now - back to math!)");
    return controller.nextActivity(sessionId, { drillOnly: true });
  }
}

async function practice(controller: SessionController, sessionId: string): Promise<void> {
  console.log("Type your answer, 'pause' to take a break or 'end' to finish.");

  for (;;) {
    const activity = await nextActivity(controller, sessionId);
    const outcome = await runActivity(controller, sessionId, activity);

    if (outcome === "pause") {
      const paused = await controller.pause(sessionId);
      console.log(`\n⏸️  ${paused.message}\n`);
      return;
    }

    if (outcome === "end") {
      const ended = await controller.end(sessionId);
      showProgressSummary(controller.getSession(sessionId), ended.progress);
      console.log(`👋 ${ended.message}\n`);
      return;
    }
  }
}

async function main(): Promise<void> {
  const { controller } = createTutor();

  console.log("\n✖️  Times Table Tutor\n");

  for (;;) {
    const sessionId = await chooseSession(controller);
    if (!sessionId) break;

    try {
      await practice(controller, sessionId);
    } catch (error) {
      if (!(error instanceof TutorError)) throw error;
      console.log(`\n⚠️  ${error.message}\n`);
    }
  }

  rl.close();
}

main().catch((error) => {
  console.error("Practice session failed:", error);
  rl.close();
  process.exitCode = 1;
});
