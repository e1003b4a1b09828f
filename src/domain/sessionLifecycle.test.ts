import { assertAllowed, operationFor, transition } from "./sessionLifecycle";
import { InvalidStateError } from "./errors";

describe("sessionLifecycle", () => {
  describe("transition", () => {
    it("pauses and ends an active session", () => {
      expect(transition("active", "pause")).toBe("paused");
      expect(transition("active", "end")).toBe("ended");
    });

    it("resumes and ends a paused session", () => {
      expect(transition("paused", "resume")).toBe("active");
      expect(transition("paused", "end")).toBe("ended");
    });

    it("treats pausing a paused session and resuming an active one as no-ops", () => {
      expect(transition("paused", "pause")).toBeNull();
      expect(transition("active", "resume")).toBeNull();
    });

    it("allows activities and answers only while active", () => {
      expect(transition("active", "next_activity")).toBe("active");
      expect(transition("active", "submit_answer")).toBe("active");
      expect(() => transition("paused", "next_activity")).toThrow(InvalidStateError);
      expect(() => transition("paused", "submit_answer")).toThrow(InvalidStateError);
    });

    it("rejects everything once ended", () => {
      for (const operation of ["pause", "resume", "end", "next_activity", "submit_answer"] as const) {
        expect(() => transition("ended", operation)).toThrow(InvalidStateError);
      }
    });

    it("explains why an operation was rejected", () => {
      expect(() => transition("paused", "submit_answer")).toThrow(
        "Session is paused; resume it first: cannot submit answer"
      );
      expect(() => transition("ended", "next_activity")).toThrow("Session has ended: cannot next activity");
    });
  });

  describe("assertAllowed", () => {
    it("does not throw for a no-op", () => {
      expect(() => assertAllowed("paused", "pause")).not.toThrow();
    });

    it("throws with status 409", () => {
      let thrown: unknown;
      try {
        assertAllowed("ended", "resume");
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(InvalidStateError);
      expect(thrown).toMatchObject({ code: "INVALID_STATE", statusCode: 409 });
    });
  });

  describe("operationFor", () => {
    it("maps each status to the operation that reaches it", () => {
      expect(operationFor("paused")).toBe("pause");
      expect(operationFor("active")).toBe("resume");
      expect(operationFor("ended")).toBe("end");
    });
  });
});
