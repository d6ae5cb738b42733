import type { LinksFunction, MetaFunction } from "@remix-run/node";
import {
  Links,
  LiveReload,
  Meta,
  NavLink,
  Outlet,
  Scripts,
  ScrollRestoration
} from "@remix-run/react";

import stylesheet from "~/styles/app.css";

const NAV_ITEMS = [
  { to: "/", label: "Executive Summary" },
  { to: "/team", label: "Team Scorecard" },
  { to: "/customers", label: "Customer Intelligence" },
  { to: "/engineering", label: "Engineering Analysis" },
  { to: "/resolution", label: "Resolution Analysis" },
  { to: "/categories", label: "Ticket Categories" }
];

export const meta: MetaFunction = () => ([
  { title: "Support Strategy Dashboard" },
  {
    name: "description",
    content: "Year-over-year support KPIs built from the latest CSV summaries."
  }
]);

export const links: LinksFunction = () => [{ rel: "stylesheet", href: stylesheet }];

export default function App() {
  return (
    <html lang="en">
      <head>
        <Meta />
        <Links />
      </head>
      <body>
        <nav className="side-nav">
          <p className="side-nav__title">Support Strategy</p>
          <ul>
            {NAV_ITEMS.map((item) => (
              <li key={item.to}>
                <NavLink to={item.to} end={item.to === "/"}>
                  {item.label}
                </NavLink>
              </li>
            ))}
          </ul>
        </nav>
        <main>
          <Outlet />
        </main>
        <ScrollRestoration />
        <Scripts />
        <LiveReload />
      </body>
    </html>
  );
}
