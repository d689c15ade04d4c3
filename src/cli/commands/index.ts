export { categoriesCommand } from './categories.js'
export { configCommand } from './config.js'
