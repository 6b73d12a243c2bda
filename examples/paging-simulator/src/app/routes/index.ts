export { type ApiModule, type RegisterRoutesFn, registerRoutes } from "./register-routes"
