import { InconsistencyError, OutOfOrderError } from '../../../src/common/errors';
import { isNoopPlan, nodesAfter, planNodesUpdate } from '../../../src/reconcile/planNodesUpdate';
import { ClusterMetaDocument } from '../../../src/types';

function documentOf(...entries: Array<[string, number, boolean]>): ClusterMetaDocument {
  return { nodes: entries.map(([node, pnn, inNodes]) => ({ node, pnn, in_nodes: inNodes })) };
}

describe('planNodesUpdate', () => {
  it('should be a no-op when every entry is confirmed and listed', () => {
    const plan = planNodesUpdate(documentOf(['10.0.0.10', 0, true], ['10.0.0.11', 1, true]), ['10.0.0.10', '10.0.0.11']);
    expect(isNoopPlan(plan)).toBe(true);
  });

  it('should be a no-op for an empty document and list', () => {
    expect(isNoopPlan(planNodesUpdate({ nodes: [] }, []))).toBe(true);
  });

  it('should append a confirmed entry missing from an empty list', () => {
    const plan = planNodesUpdate(documentOf(['10.0.0.10', 0, true]), []);

    expect(plan.appended).toEqual(['10.0.0.10']);
    expect(plan.pending).toEqual([]);
    expect(nodesAfter(plan)).toEqual(['10.0.0.10']);
  });

  it('should append and mark pending a new entry', () => {
    const plan = planNodesUpdate(documentOf(['10.0.0.10', 0, true], ['10.0.0.11', 1, false]), ['10.0.0.10']);

    expect(plan.appended).toEqual(['10.0.0.11']);
    expect(plan.pending.map(entry => entry.pnn)).toEqual([1]);
    expect(nodesAfter(plan)).toEqual(['10.0.0.10', '10.0.0.11']);
  });

  it('should visit entries in pnn order regardless of document order', () => {
    const plan = planNodesUpdate(
      documentOf(['10.0.0.12', 2, false], ['10.0.0.10', 0, true], ['10.0.0.11', 1, false]),
      ['10.0.0.10']
    );
    expect(plan.appended).toEqual(['10.0.0.11', '10.0.0.12']);
    expect(plan.pending.map(entry => entry.pnn)).toEqual([1, 2]);
  });

  it('should keep an unconfirmed entry pending without appending it twice', () => {
    const plan = planNodesUpdate(documentOf(['10.0.0.10', 0, true], ['10.0.0.11', 1, false]), ['10.0.0.10', '10.0.0.11']);

    expect(plan.appended).toEqual([]);
    expect(plan.pending.map(entry => entry.pnn)).toEqual([1]);
  });

  it('should refuse an entry that would leave a gap', () => {
    const document = documentOf(['10.0.0.10', 0, true], ['10.0.0.12', 2, false]);

    expect(() => planNodesUpdate(document, ['10.0.0.10'])).toThrow(OutOfOrderError);
    expect(() => planNodesUpdate(document, ['10.0.0.10']))
      .toThrow('Out of order pnn 2: the next position in the nodes list is 1.');
  });

  it('should refuse a position that holds another address', () => {
    const document = documentOf(['10.0.0.10', 0, true], ['10.0.0.11', 1, false]);

    expect(() => planNodesUpdate(document, ['10.0.0.10', '10.0.0.99'])).toThrow(InconsistencyError);
    expect(() => planNodesUpdate(document, ['10.0.0.10', '10.0.0.99']))
      .toThrow('pnn 1 is 10.0.0.11 in the cluster metadata but 10.0.0.99 in the nodes list');
  });

  it('should not modify its inputs', () => {
    const document = documentOf(['10.0.0.11', 1, false], ['10.0.0.10', 0, true]);
    const nodes = ['10.0.0.10'];

    planNodesUpdate(document, nodes);

    expect(document.nodes.map(entry => entry.pnn)).toEqual([1, 0]);
    expect(document.nodes[0].in_nodes).toBe(false);
    expect(nodes).toEqual(['10.0.0.10']);
  });
});
