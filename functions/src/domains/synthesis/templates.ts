// functions/src/domains/synthesis/templates.ts
// SwiftUI view skeleton, split into ordered fragments. Each fragment names the
// axiom it is written to satisfy; the enforcer checks exactly that one.

import type { ArtifactFragmentPayload } from "../../core/facts/types";

export const VIEW_NAME_PATTERN = /^[A-Z][A-Za-z0-9_]*$/;

type FragmentTemplate = {
  order: number;
  section: string;
  axiomId: string;
  render(name: string): string;
};

const VIEW_TEMPLATE: readonly FragmentTemplate[] = [
  {
    order: 10,
    section: "view",
    axiomId: "INIT_PURITY",
    render: (name) =>
      [
        "import SwiftUI",
        "",
        `struct ${name}: View {`,
        `    @StateObject private var viewModel = ${name}Model()`,
        "",
        "    var body: some View {",
        "        NavigationStack {",
        "            content",
        `                .navigationTitle("${name}")`,
        "        }",
        "        .task { await viewModel.loadData() }",
        "    }",
      ].join("\n"),
  },
  {
    order: 20,
    section: "content",
    axiomId: "ERROR_HANDLING",
    render: () =>
      [
        "",
        "    @ViewBuilder",
        "    private var content: some View {",
        "        if viewModel.isLoading {",
        "            ProgressView()",
        "        } else {",
        "            List(viewModel.items, id: \\.self) { item in",
        "                Text(item)",
        "            }",
        "        }",
        "    }",
        "}",
      ].join("\n"),
  },
  {
    order: 30,
    section: "model",
    axiomId: "OBSERVABLE_STATE",
    render: (name) =>
      [
        "",
        "@Observable",
        `class ${name}Model {`,
        "    var items: [String] = []",
        "    var isLoading = false",
        "    var error: Error?",
      ].join("\n"),
  },
  {
    order: 40,
    section: "loading",
    axiomId: "MAIN_ACTOR",
    render: (name) =>
      [
        "",
        "    @MainActor",
        "    func loadData() async {",
        "        isLoading = true",
        "        defer { isLoading = false }",
        "",
        "        do {",
        "            try await Task.sleep(for: .seconds(1))",
        '            items = ["Item 1", "Item 2", "Item 3"]',
        "        } catch {",
        "            self.error = error",
        "        }",
        "    }",
        "}",
        "",
        "#Preview {",
        `    ${name}()`,
        "}",
      ].join("\n"),
  },
];

export function renderViewFragments(name: string): ArtifactFragmentPayload[] {
  return VIEW_TEMPLATE.map((t) => ({
    target: name,
    order: t.order,
    section: t.section,
    axiomId: t.axiomId,
    text: t.render(name),
  }));
}
