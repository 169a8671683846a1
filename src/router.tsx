import {
  createRouter,
  createRoute,
  createRootRoute,
  Link,
} from "@tanstack/react-router";
import App from "./App";
import { GameOfLife } from "./components/GameOfLife";
import AboutPage from "./pages/AboutPage";

// Root route
const rootRoute = createRootRoute({
  component: App,
  notFoundComponent: () => (
    <div className="p-8 text-center">
      <h2 className="text-2xl font-bold text-gray-900 mb-4">Page Not Found</h2>
      <Link to="/" className="text-blue-600 hover:text-blue-800 font-medium">
        ← Back to the board
      </Link>
    </div>
  ),
});

// Home route
const indexRoute = createRoute({
  getParentRoute: () => rootRoute,
  path: "/",
  component: GameOfLife,
});

const aboutRoute = createRoute({
  getParentRoute: () => rootRoute,
  path: "/about",
  component: AboutPage,
});

// Create the route tree
const routeTree = rootRoute.addChildren([indexRoute, aboutRoute]);

// Create the router
export const router = createRouter({ routeTree });

// Register router for typesafety
declare module "@tanstack/react-router" {
  interface Register {
    router: typeof router;
  }
}
