export * from './planNodesUpdate';
export * from './NodesReconciler';
