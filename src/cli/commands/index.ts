export { addCommand } from './add.js'
export { editCommand } from './edit.js'
export { searchCommand } from './search.js'
export { summaryCommand } from './summary.js'
export { logsCommand } from './logs.js'
export { initCommand } from './init.js'
