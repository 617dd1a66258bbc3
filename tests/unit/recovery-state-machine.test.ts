import { describe, it, expect } from "vitest";
import { canTransition, validateTransition } from "../../src/domain/recovery-state-machine";

describe("Recovery state machine", () => {
  describe("canTransition", () => {
    it("should allow escalating from monitoring", () => {
      expect(canTransition("monitoring", "soft_recovery")).toBe(true);
      expect(canTransition("monitoring", "hard_recovery")).toBe(true);
    });

    it("should allow soft recovery to settle or escalate", () => {
      expect(canTransition("soft_recovery", "monitoring")).toBe(true);
      expect(canTransition("soft_recovery", "hard_recovery")).toBe(true);
    });

    it("should only reach failed through hard recovery", () => {
      expect(canTransition("monitoring", "failed")).toBe(false);
      expect(canTransition("soft_recovery", "failed")).toBe(false);
      expect(canTransition("hard_recovery", "failed")).toBe(true);
    });

    it("should treat failed as terminal", () => {
      expect(canTransition("failed", "monitoring")).toBe(false);
      expect(canTransition("failed", "soft_recovery")).toBe(false);
    });
  });

  describe("validateTransition", () => {
    it("should not throw for valid transitions", () => {
      expect(() => validateTransition("hard_recovery", "monitoring")).not.toThrow();
    });

    it("should list the allowed targets when rejecting", () => {
      expect(() => validateTransition("monitoring", "failed")).toThrow(
        "Invalid recovery transition: monitoring -> failed. Allowed: soft_recovery, hard_recovery"
      );
      expect(() => validateTransition("failed", "monitoring")).toThrow("Allowed: none");
    });
  });
});
