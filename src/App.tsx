import { Link, Outlet } from "@tanstack/react-router";

function App() {
  return (
    <div className="p-5">
      <nav className="max-w-4xl mx-auto mb-4 flex gap-4 text-sm font-medium">
        <Link to="/" className="[&.active]:text-blue-600">
          Board
        </Link>
        <Link to="/about" className="[&.active]:text-blue-600">
          Rules
        </Link>
      </nav>
      <div className="max-w-4xl mx-auto flex justify-center">
        <Outlet />
      </div>
    </div>
  );
}

export default App;
