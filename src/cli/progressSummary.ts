import { Session } from "../domain/session";
import { familyStats, recentStreak, toPercent, accuracy } from "../domain/performance";
import { ProgressReport } from "../services/sessionController";
import { renderProgressBar } from "./helpers";

/**
 * Lines of the per-family breakdown, smallest family first.
 */
export function formatFamilyBreakdown(session: Session, weakAreas: readonly number[]): string[] {
  return familyStats(session.history).map(stats => {
    const percent = toPercent(stats.accuracy);
    const marker = weakAreas.includes(stats.factFamily) ? "  ← keep practicing" : "";
    const label = String(stats.factFamily).padStart(2, " ");
    return `   ${label}× ${renderProgressBar(stats.correct, stats.attempts, 20)} ${stats.correct}/${stats.attempts} (${percent}%)${marker}`;
  });
}

/**
 * Display a progress summary for a session
 */
export function showProgressSummary(session: Session, report: ProgressReport): void {
  console.log("\n" + "═".repeat(50));
  console.log(`  Progress Summary for ${session.studentName}`);
  console.log("═".repeat(50));

  if (session.history.length === 0) {
    console.log("\n  No questions answered yet. Let's get started!\n");
    return;
  }

  const percent = toPercent(accuracy(session.history));
  console.log("\n📊 Your Progress:\n");
  console.log(`   Questions:  ${report.totalQuestions}`);
  console.log(`   Accuracy:   ${renderProgressBar(percent, 100, 20)} ${percent}%`);

  const streak = recentStreak(session.history);
  console.log(`   🔥 Current streak: ${streak} correct in a row`);

  if (report.quizzesAnswered > 0) {
    console.log(`   🧠 Quizzes: ${report.quizzesCorrect}/${report.quizzesAnswered} correct`);
  }

  console.log("\n📚 Times tables:\n");
  for (const line of formatFamilyBreakdown(session, report.weakAreas)) {
    console.log(line);
  }

  console.log(`\n${report.summary}\n`);
}
