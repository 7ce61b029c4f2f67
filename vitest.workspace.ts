export default ["packages/*", "apps/*"];
