import React from "react";
import ReactDOM from "react-dom/client";
import "./index.css";
import AStarLab from "./App";

const root = document.getElementById("root");
if (!root) throw new Error("missing #root element in index.html");

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <AStarLab />
  </React.StrictMode>
);
