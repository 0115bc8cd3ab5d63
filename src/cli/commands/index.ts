export { yearlyCommand } from './yearly.js'
export { monthlyCommand } from './monthly.js'
