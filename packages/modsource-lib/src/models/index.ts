export {
  formatModuleSource,
  moduleSourceSchema,
  validateModuleSource,
} from "./module-source";
