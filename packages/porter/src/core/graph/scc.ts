/**
 * Tarjan's strongly connected components, iterative so deep dependency
 * chains cannot overflow the call stack.
 */

interface NodeState {
  name: string;
  index: number;
  low: number;
  onStack: boolean;
}

interface Frame {
  node: NodeState;
  next: number;
}

/**
 * Components in the order Tarjan completes them (dependencies first).
 * Every node appears in exactly one component.
 */
export function stronglyConnectedComponents(
  nodes: readonly string[],
  edges: ReadonlyMap<string, readonly string[]>
): string[][] {
  const states = new Map<string, NodeState>();
  const stack: NodeState[] = [];
  const components: string[][] = [];
  let counter = 0;

  const visit = (name: string): NodeState => {
    const state: NodeState = { name, index: counter, low: counter, onStack: true };
    counter++;
    states.set(name, state);
    stack.push(state);
    return state;
  };

  for (const root of nodes) {
    if (states.has(root)) continue;

    const work: Frame[] = [{ node: visit(root), next: 0 }];
    while (work.length > 0) {
      const frame = work[work.length - 1];
      const successors = edges.get(frame.node.name) ?? [];

      if (frame.next < successors.length) {
        const target = successors[frame.next];
        frame.next++;
        const known = states.get(target);
        if (!known) {
          work.push({ node: visit(target), next: 0 });
        } else if (known.onStack) {
          frame.node.low = Math.min(frame.node.low, known.index);
        }
        continue;
      }

      work.pop();
      if (frame.node.low === frame.node.index) {
        const component: string[] = [];
        let member: NodeState | undefined;
        do {
          member = stack.pop();
          if (!member) break;
          member.onStack = false;
          component.push(member.name);
        } while (member !== frame.node);
        components.push(component);
      }

      const parent = work[work.length - 1];
      if (parent) {
        parent.node.low = Math.min(parent.node.low, frame.node.low);
      }
    }
  }

  return components;
}
