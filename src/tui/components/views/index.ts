export { DetailPanel } from './DetailPanel.js'
export { ConfirmDialog } from './ConfirmDialog.js'
