export function getHelpLines(): string[] {
  return [
    'tasktui - Keyboard Shortcuts',
    '',
    'Navigation:',
    '• ↑/↓        Navigate tasks',
    '• Space      Toggle task completion',
    '• q          Quit application',
    '',
    'Task Management:',
    '• a          Add new task',
    '• d          Delete selected task',
    '',
    'Interface:',
    '• Ctrl+Space Hide/show todo list',
    '• h          Show/hide this help',
    '• Esc        Close help or cancel action',
    '',
    'Press any key to close this help...',
  ];
}
