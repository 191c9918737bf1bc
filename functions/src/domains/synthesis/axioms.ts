// functions/src/domains/synthesis/axioms.ts
// Constructive axioms: what correct code looks like, plus a textual check per axiom.

export type AxiomType = "lifecycle" | "memory" | "concurrency" | "state" | "architecture";

export type AxiomCheckResult = { applicable: boolean; satisfied: boolean; reason: string };

export type ConstructiveAxiom = {
  id: string;
  name: string;
  type: AxiomType;
  statement: string;
  check(code: string): AxiomCheckResult;
};

const SIDE_EFFECT_WORDS = ["fetch", "load", "start", "URLSession"];

const AXIOM_LIST: readonly ConstructiveAxiom[] = [
  {
    id: "INIT_PURITY",
    name: "Initialization Purity",
    type: "lifecycle",
    statement: "Initialization must be side-effect free and O(1)",
    check(code) {
      const initBody = /init\s*\([^)]*\)\s*\{([^}]*)\}/.exec(code);
      const isView = /struct\s+\w+\s*:\s*View\b/.test(code);
      if (!initBody && !isView) return { applicable: false, satisfied: true, reason: "No initializer or view" };
      if (initBody && SIDE_EFFECT_WORDS.some((w) => initBody[1].includes(w))) {
        return { applicable: true, satisfied: false, reason: "Side-effects detected in init" };
      }
      return { applicable: true, satisfied: true, reason: "Init is pure" };
    },
  },
  {
    id: "WEAK_CAPTURE",
    name: "Weak Self Capture",
    type: "memory",
    statement: "Closures must capture self weakly to prevent retain cycles",
    check(code) {
      if (!code.includes("self.")) return { applicable: false, satisfied: true, reason: "No self references" };
      const strongSelf = /\{\s*\w+\s+in\s*\n?\s*self\./.test(code);
      if (strongSelf && !code.includes("[weak self]")) {
        return { applicable: true, satisfied: false, reason: "Strong self capture in closure" };
      }
      return { applicable: true, satisfied: true, reason: "Proper weak self or no closures" };
    },
  },
  {
    id: "OBSERVABLE_STATE",
    name: "Observable State Management",
    type: "state",
    statement: "State changes must trigger observation notifications",
    check(code) {
      const hasObservable = code.includes("@Observable") || code.includes("ObservableObject");
      const hasState = code.includes("@State") || code.includes("@StateObject");
      if (!hasObservable && !hasState) return { applicable: false, satisfied: true, reason: "No state declared" };
      if (hasState && !hasObservable) return { applicable: true, satisfied: false, reason: "State without Observable pattern" };
      return { applicable: true, satisfied: true, reason: "Proper observable state" };
    },
  },
  {
    id: "MAIN_ACTOR",
    name: "Main Actor Isolation",
    type: "concurrency",
    statement: "UI state must only be mutated on the main actor",
    check(code) {
      if (!code.includes("async")) return { applicable: false, satisfied: true, reason: "No async code" };
      const uiUpdate = ["@Published", "items =", "isLoading ="].some((p) => code.includes(p));
      const mainActor = code.includes("@MainActor") || code.includes("MainActor.run");
      if (uiUpdate && !mainActor) return { applicable: true, satisfied: false, reason: "Async UI updates without MainActor" };
      return { applicable: true, satisfied: true, reason: "Proper main actor usage" };
    },
  },
  {
    id: "ERROR_HANDLING",
    name: "Explicit Error Handling",
    type: "architecture",
    statement: "Errors must be handled, never force-unwrapped",
    check(code) {
      if (code.includes("try!") || code.includes("as!")) {
        return { applicable: true, satisfied: false, reason: "Force unwrap detected" };
      }
      return { applicable: true, satisfied: true, reason: "Proper error handling" };
    },
  },
  {
    id: "INTERPOSABLE_CONFIG",
    name: "Interposable Build Configuration",
    type: "architecture",
    statement: "Debug builds must link with -Xlinker -interposable",
    check(code) {
      if (code.includes("-interposable")) return { applicable: true, satisfied: true, reason: "Interposable flag present" };
      const lower = code.toLowerCase();
      if (lower.includes("project.yml") || lower.includes("xcodegen")) {
        return { applicable: true, satisfied: false, reason: "XcodeGen config missing interposable" };
      }
      return { applicable: false, satisfied: true, reason: "Not a config file" };
    },
  },
];

const BY_ID = new Map(AXIOM_LIST.map((a) => [a.id, a]));

export function getAxiom(id: string): ConstructiveAxiom | null {
  return BY_ID.get(id) ?? null;
}

export function listAxioms(): readonly ConstructiveAxiom[] {
  return AXIOM_LIST;
}
