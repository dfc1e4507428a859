// Stylesheets imported for their side effects (leaflet/dist/leaflet.css)
declare module '*.css'
