import type { SelectionMode } from '../../types/shift'

interface SelectionToolbarProps {
  mode: SelectionMode
  count: number
  canConfirm: boolean
  isSubmitting?: boolean
  onCancel: () => void
  onConfirm: () => void
}

const CONFIRM_LABEL: Record<SelectionMode, string> = {
  add: '为所选日期添加班次',
  delete: '删除所选班次',
}

export default function SelectionToolbar({
  mode,
  count,
  canConfirm,
  isSubmitting = false,
  onCancel,
  onConfirm,
}: SelectionToolbarProps) {
  const unit = mode === 'add' ? '天' : '个班次'

  return (
    <div className="sc-selection-toolbar" role="toolbar" aria-label="批量操作">
      <span className="sc-selection-count" data-testid="selection-count">
        已选 {count} {unit}
      </span>
      <button type="button" onClick={onCancel} disabled={isSubmitting}>
        取消
      </button>
      <button type="button" onClick={onConfirm} disabled={!canConfirm || isSubmitting}>
        {CONFIRM_LABEL[mode]}
      </button>
    </div>
  )
}
