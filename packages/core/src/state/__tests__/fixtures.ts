import type { Rng } from "@termline/testkit";
import {
  type ComponentState,
  type ModalType,
  type Snapshot,
  createComponentState,
  createSnapshot,
} from "../snapshot.js";

/** A populated snapshot with JSON-safe values. */
export function randomSnapshot(rng: Rng): Snapshot {
  const count = rng.int(1, 6);
  const components: ComponentState[] = [];
  for (let i = 0; i < count; i++) {
    components.push(
      createComponentState(`c${i}`, {
        type: rng.pick(["text", "button", "list"]),
        props: { label: `L${rng.int(0, 99)}`, width: rng.int(0, 80) },
        state: {
          value: rng.chance(50) ? `v${rng.int(0, 9)}` : null,
          items: [rng.int(0, 5), rng.int(0, 5)],
          checked: rng.chance(50),
        },
        rect: { x: rng.int(0, 80), y: rng.int(0, 24), width: rng.int(0, 40), height: rng.int(0, 10) },
        visible: rng.chance(80),
        disabled: rng.chance(20),
      }),
    );
  }
  const modals = rng.chance(50)
    ? [
        {
          id: "m1",
          type: rng.pick<ModalType>(["dialog", "menu"]),
          focus: "c0",
          open: true,
          closable: rng.chance(50),
        },
      ]
    : [];
  return createSnapshot({
    timestamp: rng.int(0, 1_000_000_000),
    focusPath: ["root", `c${rng.int(0, count - 1)}`],
    components,
    modals,
    dirty: { cells: [{ x: rng.int(0, 9), y: rng.int(0, 9) }], rects: [] },
    metadata: { run: rng.int(0, 9) },
  });
}
