export const EPOCH_TOPIC = 'Epoch';
export const SIMSTATE_TOPIC = 'SimState';
export const STATUS_READY_TOPIC = 'Status.Ready';
export const STATUS_ERROR_TOPIC = 'Status.Error';

export function componentTopic(topicBase: string, componentName: string): string {
  return [topicBase, componentName].join('.');
}
